export type SupervisorState = "starting" | "running" | "shutting_down" | "restarting" | "stopped";
