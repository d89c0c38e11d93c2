import { TTSService } from '../../application/TTSService';
import { Voice, formatVoice } from '../../domain/entities/Voice';
import { TTSAppError } from '../../domain/errors';
import { Print, Prompter } from './Prompter';

const COLUMN_GAP = '  ';

/**
 * Renders voices as a numbered, column-aligned table.
 */
export function renderVoiceTable(voices: Voice[]): string[] {
    const header = ['#', 'Name', 'Voice ID', 'Category'];
    const rows = voices.map((voice, i) => [
        String(i + 1),
        voice.name,
        voice.voiceId,
        voice.category || 'N/A',
    ]);

    const widths = header.map((title, col) =>
        Math.max(title.length, ...rows.map((row) => row[col].length))
    );
    const format = (cells: string[]) =>
        cells.map((cell, col) => cell.padEnd(widths[col])).join(COLUMN_GAP).trimEnd();

    return [
        'Available Voices',
        format(header),
        widths.map((w) => '-'.repeat(w)).join(COLUMN_GAP),
        ...rows.map(format),
    ];
}

/**
 * Interactive voice selection: a number picks from the table, anything else
 * searches the full list, `q` quits.
 * @returns the selected voice ID, or null when cancelled
 */
export async function selectVoiceInteractive(
    service: TTSService,
    prompter: Prompter,
    print: Print
): Promise<string | null> {
    print('Fetching available voices...');

    let allVoices: Voice[];
    try {
        allVoices = await service.listVoices();
    } catch (error) {
        if (error instanceof TTSAppError) {
            print(`Error: ${error.message}`);
            return null;
        }
        throw error;
    }

    if (allVoices.length === 0) {
        print('No voices available.');
        return null;
    }

    let currentVoices = allVoices;

    for (;;) {
        renderVoiceTable(currentVoices).forEach((line) => print(line));
        print("Enter number to select, text to search, or 'q' to quit");

        const answer = await prompter.ask('Your choice: ');
        if (answer === null) {
            return null;
        }

        const input = answer.trim();
        if (input.toLowerCase() === 'q') {
            return null;
        }

        if (/^\d+$/.test(input)) {
            const index = Number(input);
            if (index >= 1 && index <= currentVoices.length) {
                const selected = currentVoices[index - 1];
                print(`✓ Selected: ${formatVoice(selected)}`);
                return selected.voiceId;
            }
            print(`Invalid number. Please enter 1-${currentVoices.length}`);
            continue;
        }

        const matches = service.searchVoices(input, allVoices);
        if (matches.length === 0) {
            print(`No voices match '${input}'. Showing all voices again.`);
            currentVoices = allVoices;
        } else {
            print(`Filtered to ${matches.length} voice(s)`);
            currentVoices = matches;
        }
    }
}
