#!/usr/bin/env node
import { getConfig, validateConfig } from './config';
import { ElevenLabsClient } from './infrastructure/tts/ElevenLabsClient';
import { ReadlinePrompter } from './presentation/cli/Prompter';
import { runCli } from './presentation/cli/runCli';

async function main(): Promise<void> {
    const config = getConfig();
    validateConfig(config).forEach((problem) => console.warn(`[CLI] ${problem}`));

    const prompter = new ReadlinePrompter(process.stdin, process.stdout);
    try {
        process.exitCode = await runCli(process.argv.slice(2), {
            createClient: () => new ElevenLabsClient(),
            prompter,
            print: (line) => process.stdout.write(`${line}\n`),
            cwd: () => process.cwd(),
        });
    } finally {
        prompter.close();
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
