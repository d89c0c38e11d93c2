import { Interface, createInterface } from 'readline/promises';

/**
 * Line-oriented user input. `null` means the user cancelled (Ctrl+C / Ctrl+D).
 */
export interface Prompter {
    ask(question: string): Promise<string | null>;
    close(): void;
}

/** Writes one line of user-facing output */
export type Print = (line: string) => void;

/**
 * Prompter backed by a `readline/promises` interface over a terminal or pipe.
 */
export class ReadlinePrompter implements Prompter {
    private readonly rl: Interface;
    private closed = false;
    private pending?: (answer: string | null) => void;

    constructor(input: NodeJS.ReadableStream, output: NodeJS.WritableStream) {
        this.rl = createInterface({ input, output });
        this.rl.on('SIGINT', () => this.rl.close());
        this.rl.on('close', () => {
            this.closed = true;
            this.settle(null);
        });
    }

    ask(question: string): Promise<string | null> {
        if (this.closed) {
            return Promise.resolve(null);
        }
        return new Promise((resolve, reject) => {
            this.pending = resolve;
            this.rl.question(question).then(
                (answer) => this.settle(answer),
                (error: unknown) => {
                    // closing mid-question is a cancel, not a failure
                    if (this.closed) {
                        this.settle(null);
                        return;
                    }
                    this.pending = undefined;
                    reject(error);
                }
            );
        });
    }

    close(): void {
        if (!this.closed) {
            this.rl.close();
        }
    }

    private settle(answer: string | null): void {
        const resolve = this.pending;
        this.pending = undefined;
        resolve?.(answer);
    }
}
