import "reflect-metadata";

export * from "./engine.module";
export * from "./errors";
export * from "./graph/communication-graph";
export * from "./threads/thread";
export * from "./threads/thread-key";
export * from "./threads/thread-manager";
export * from "./threads/keyed-mutex";
export * from "./threads/thread-snapshot.schema";
export * from "./thread-compactors";
export * from "./agents/agent-registry";
export * from "./context/run-context";
export * from "./dispatch/abort.util";
export * from "./dispatch/call-stack";
export * from "./dispatch/completion-response.schema";
export * from "./dispatch/dispatch.types";
export * from "./dispatch/dispatcher.service";
export * from "./dispatch/send-message.tool";
export * from "./dispatch/tool-call-handler";
export * from "./agency/agency";
export * from "./agency/agency-structure";
export * from "./agency/agency.factory";
export * from "./agency/event-queue";
export * from "./agency/trace-writer";
