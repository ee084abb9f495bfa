import { Module } from "@nestjs/common";
import type { Provider } from "@nestjs/common";
import { JsonlWriterService } from "./jsonl-writer.service";
import { LoggerService } from "./logger.service";

const providers: Provider[] = [LoggerService, JsonlWriterService];

@Module({
  providers,
  exports: providers,
})
export class IoModule {}
