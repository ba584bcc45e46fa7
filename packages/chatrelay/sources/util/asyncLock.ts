/**
 * Runs async work one at a time in arrival order.
 */
export class AsyncLock {
    private locked = false;
    private waiting: Array<() => void> = [];

    get busy(): boolean {
        return this.locked || this.waiting.length > 0;
    }

    async inLock<T>(func: () => Promise<T> | T): Promise<T> {
        await this.acquire();
        try {
            return await func();
        } finally {
            this.release();
        }
    }

    private async acquire(): Promise<void> {
        if (!this.locked) {
            this.locked = true;
            return;
        }
        await new Promise<void>((resolve) => {
            this.waiting.push(resolve);
        });
    }

    private release(): void {
        const next = this.waiting.shift();
        if (next) {
            // Ownership passes directly to the next waiter.
            next();
            return;
        }
        this.locked = false;
    }
}
