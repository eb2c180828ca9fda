// src/migration/progress.ts

export interface OutputStream {
    write(chunk: string): unknown;
}

/** Appends a note to the current action's "done" line. */
export type StatusFn = (note: string) => void;

/**
 * Operator-facing progress output, separate from the diagnostic Logger.
 */
export interface ProgressReporter {
    /**
     * Prints `label... `, runs the work, then `done` (with any status note) or `failed`.
     */
    action<R>(label: string, work: (status: StatusFn) => Promise<R>): Promise<R>;
    message(text: string): void;
}

export class ConsoleProgress implements ProgressReporter {
    constructor(private readonly out: OutputStream = process.stdout) { }

    public async action<R>(label: string, work: (status: StatusFn) => Promise<R>): Promise<R> {
        this.out.write(`${label}... `);
        const status: { note: string | null } = { note: null };
        try {
            const result = await work((text) => { status.note = text; });
            this.out.write(status.note === null ? 'done\n' : `done, ${status.note}\n`);
            return result;
        } catch (error) {
            this.out.write('failed\n');
            throw error;
        }
    }

    public message(text: string): void {
        this.out.write(`${text}\n`);
    }
}
