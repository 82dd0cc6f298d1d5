export type Clock = () => number;
export type Sleep = (ms: number) => Promise<void>;
export type Logger = Pick<Console, "log" | "warn" | "error">;

export const systemClock: Clock = () => Date.now();

export const silentLogger: Logger = { log: () => {}, warn: () => {}, error: () => {} };
