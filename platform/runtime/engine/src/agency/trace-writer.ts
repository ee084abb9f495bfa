import type { JsonlWriterService } from "@switchboard/io";
import type { AgencyStreamEvent } from "@switchboard/types";

/**
 * Mirrors agency stream events into a JSONL file. Without `append` the file
 * is truncated by the first event this writer records.
 */
export class RunTraceWriter {
  private started = false;

  constructor(
    private readonly writer: JsonlWriterService,
    readonly filePath: string,
    private readonly append = true,
  ) {}

  async write(event: AgencyStreamEvent): Promise<void> {
    const append = this.append || this.started;
    this.started = true;
    await this.writer.write(this.filePath, event, append);
  }
}
