import pino, { type BaseLogger } from "pino";

export type VfsLogger = BaseLogger;

export const silentLogger: VfsLogger = pino({ enabled: false });
