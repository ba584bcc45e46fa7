export class CompletionError extends Error {
    readonly status: number | null;

    constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "CompletionError";
        this.status = status;
    }
}
