import { Injectable } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";

export interface JsonlWriterEvent {
  filePath: string;
  event: unknown;
  append: boolean;
}

export type JsonlWriterListener = (event: JsonlWriterEvent) => void;

/**
 * Writes one JSON document per line. Writes to the same file are applied in
 * call order.
 */
@Injectable()
export class JsonlWriterService {
  private readonly listeners = new Set<JsonlWriterListener>();
  private readonly pending = new Map<string, Promise<void>>();

  registerListener(listener: JsonlWriterListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async write(filePath: string, event: unknown, append = true): Promise<void> {
    const target = path.resolve(filePath);
    const previous = this.pending.get(target) ?? Promise.resolve();
    const next = previous
      .catch(() => undefined)
      .then(() => this.persist(target, event, append));
    this.pending.set(target, next);

    try {
      await next;
    } finally {
      if (this.pending.get(target) === next) {
        this.pending.delete(target);
      }
    }

    this.notify({ filePath, event, append });
  }

  private async persist(
    filePath: string,
    event: unknown,
    append: boolean,
  ): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const payload = `${JSON.stringify(event)}\n`;
    if (append) {
      await fs.appendFile(filePath, payload, "utf-8");
    } else {
      await fs.writeFile(filePath, payload, "utf-8");
    }
  }

  private notify(event: JsonlWriterEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
