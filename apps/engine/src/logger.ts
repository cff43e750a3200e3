import { pino, type BaseLogger } from "pino";

/** The slice of a pino logger the engine components write to. */
export type Logger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export const silentLogger: Logger = pino({ level: "silent" });
