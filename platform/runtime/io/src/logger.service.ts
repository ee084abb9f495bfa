import { Injectable } from "@nestjs/common";
import fs from "fs";
import path from "path";
import pino, { type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig, LoggingDestination } from "@switchboard/types";

type LogMethod = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

const LOG_METHODS: readonly LogMethod[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

const DEFAULT_LOG_FILE = ".switchboard/logs/switchboard.log";

export interface LoggerEvent {
  level: LogMethod;
  /** Scope binding of the logger that emitted the event, if any. */
  scope?: string;
  args: unknown[];
}

export type LoggerListener = (event: LoggerEvent) => void;

/**
 * Owns the pino root logger. Scoped children are wrapped so registered
 * listeners observe every call regardless of the configured level.
 */
@Injectable()
export class LoggerService {
  private rootLogger: Logger | null = null;
  private rawLogger: Logger | null = null;
  private cachedSignature = "";
  private readonly listeners = new Set<LoggerListener>();
  private readonly wrapped = new WeakSet<Logger>();

  registerListener(listener: LoggerListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  configure(config?: LoggingConfig): Logger {
    const signature = JSON.stringify(config ?? {});
    if (this.rootLogger && signature === this.cachedSignature) {
      return this.rootLogger;
    }
    this.install(this.buildLogger(config));
    this.cachedSignature = signature;
    return this.requireRoot();
  }

  getLogger(scope?: string): Logger {
    const root = this.requireRoot();
    if (!scope) {
      return root;
    }
    const base = this.rawLogger ?? root;
    return this.wrapLogger(base.child({ scope }), scope);
  }

  withBindings(bindings: Record<string, unknown>): Logger {
    return this.getLogger().child(bindings);
  }

  reset(): void {
    this.rootLogger = null;
    this.rawLogger = null;
    this.cachedSignature = "";
  }

  private requireRoot(): Logger {
    if (this.rootLogger) {
      return this.rootLogger;
    }
    return this.install(this.buildLogger());
  }

  private install(rawLogger: Logger): Logger {
    this.rawLogger = rawLogger;
    this.rootLogger = this.wrapLogger(rawLogger);
    return this.rootLogger;
  }

  private resolvePrettyTransport(
    destination?: LoggingDestination
  ): LoggerOptions["transport"] {
    const wantsPretty =
      destination?.pretty ?? (destination?.type !== "file" && process.stdout.isTTY);
    if (!wantsPretty) return undefined;

    try {
      require.resolve("pino-pretty");
    } catch {
      return undefined;
    }

    return {
      target: "pino-pretty",
      options: {
        colorize: destination?.colorize ?? true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
      },
    };
  }

  private prepareDestination(destination?: LoggingDestination) {
    switch (destination?.type) {
      case "stdout":
        return pino.destination({ fd: 1 });
      case "stderr":
        return pino.destination({ fd: 2 });
      case "file": {
        const filePath = path.resolve(destination.path ?? DEFAULT_LOG_FILE);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        return pino.destination({ dest: filePath, sync: false });
      }
      default:
        return undefined;
    }
  }

  private buildLogger(config?: LoggingConfig): Logger {
    const options: LoggerOptions = {
      level: config?.level ?? "info",
      base: undefined,
      timestamp:
        config?.enableTimestamps === false
          ? false
          : pino.stdTimeFunctions.isoTime,
    };

    const transport = this.resolvePrettyTransport(config?.destination);
    if (transport) {
      options.transport = transport;
      return pino(options);
    }

    const destStream = this.prepareDestination(config?.destination);
    return destStream ? pino(options, destStream) : pino(options);
  }

  private wrapLogger(logger: Logger, scope?: string): Logger {
    if (this.wrapped.has(logger)) {
      return logger;
    }

    const service = this;
    const proxy = new Proxy(logger, {
      get(target, property, receiver) {
        if (property === "child") {
          return (...args: Parameters<Logger["child"]>) =>
            service.wrapLogger(target.child<never>(...args), scope);
        }

        const level = LOG_METHODS.find((method) => method === property);
        const original = Reflect.get(target, property, receiver);
        if (!level || typeof original !== "function") {
          return original;
        }

        return (...args: unknown[]) => {
          service.notify({ level, scope, args });
          return original.apply(target, args);
        };
      },
    });

    this.wrapped.add(proxy);
    return proxy;
  }

  private notify(event: LoggerEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
