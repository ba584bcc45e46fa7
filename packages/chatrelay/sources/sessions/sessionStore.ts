import { getLogger } from "../log.js";
import type { ImageContext, Session, Turn, TurnRole } from "../types.js";
import { AsyncLock } from "../util/asyncLock.js";
import { sessionHistoryTrim } from "./sessionHistoryTrim.js";

export const DEFAULT_MAX_HISTORY = 20;

export type SessionStoreOptions = {
    maxHistory?: number;
    now?: () => Date;
};

type SessionRecord = {
    history: Turn[];
    imageContext: ImageContext | null;
    lock: AsyncLock;
};

const logger = getLogger("sessions");

/**
 * Process-local conversation memory keyed by user id.
 * Sessions are created on first access and live until cleared.
 */
export class SessionStore {
    readonly maxHistory: number;
    private sessions = new Map<string, SessionRecord>();
    private now: () => Date;

    constructor(options: SessionStoreOptions = {}) {
        this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
        if (!Number.isInteger(this.maxHistory) || this.maxHistory <= 0) {
            throw new Error(`maxHistory must be a positive integer, got ${this.maxHistory}`);
        }
        this.now = options.now ?? (() => new Date());
    }

    get size(): number {
        return this.sessions.size;
    }

    getOrCreate(userId: string): Session {
        const record = this.record(userId);
        return {
            userId,
            history: [...record.history],
            imageContext: record.imageContext ? { ...record.imageContext } : null
        };
    }

    appendTurn(userId: string, role: TurnRole, content: string): void {
        const record = this.record(userId);
        const turn: Turn = Object.freeze({ role, content });
        record.history.push(turn);
        sessionHistoryTrim(record.history, this.maxHistory);
    }

    /**
     * Appends a user turn and its reply as one step so trimming sees the pair together.
     */
    appendExchange(userId: string, userContent: string, assistantContent: string): void {
        const record = this.record(userId);
        const userTurn: Turn = Object.freeze({ role: "user", content: userContent });
        const assistantTurn: Turn = Object.freeze({ role: "assistant", content: assistantContent });
        record.history.push(userTurn, assistantTurn);
        sessionHistoryTrim(record.history, this.maxHistory);
    }

    setImageContext(userId: string, image: Uint8Array, mimeType: string, descriptor: string): ImageContext {
        const record = this.record(userId);
        const context: ImageContext = {
            image,
            mimeType,
            descriptor,
            capturedAt: this.now()
        };
        record.imageContext = context;
        logger.debug(`event: Image context replaced userId=${userId} bytes=${image.byteLength}`);
        return { ...context };
    }

    clear(userId: string): void {
        const record = this.sessions.get(userId);
        if (!record) {
            return;
        }
        record.history.length = 0;
        record.imageContext = null;
        logger.debug(`event: Session cleared userId=${userId}`);
    }

    clearAll(): void {
        const count = this.sessions.size;
        this.sessions.clear();
        logger.debug(`event: All sessions cleared count=${count}`);
    }

    /**
     * Serializes work for one user; other users are not blocked.
     */
    inUserLock<T>(userId: string, work: () => Promise<T> | T): Promise<T> {
        return this.record(userId).lock.inLock(work);
    }

    private record(userId: string): SessionRecord {
        const existing = this.sessions.get(userId);
        if (existing) {
            return existing;
        }
        const created: SessionRecord = {
            history: [],
            imageContext: null,
            lock: new AsyncLock()
        };
        this.sessions.set(userId, created);
        return created;
    }
}
