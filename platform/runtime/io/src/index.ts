export * from "./io.module";
export * from "./jsonl-writer.service";
export * from "./logger.service";
export type { Logger } from "pino";
