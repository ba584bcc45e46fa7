/**
 * Raised when the environment does not describe a runnable relay.
 * `issues` lists every problem, one entry per variable.
 */
export class ConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
        this.name = "ConfigError";
        this.issues = issues;
    }
}
