import { Module } from "@nestjs/common";
import { ConfigModule } from "@switchboard/config";
import { IoModule } from "@switchboard/io";
import { AgencyFactory } from "./agency/agency.factory";
import { DispatcherService } from "./dispatch/dispatcher.service";
import { ToolCallHandler } from "./dispatch/tool-call-handler";
import { threadCompactorFactoryProvider } from "./thread-compactors";

@Module({
  imports: [ConfigModule, IoModule],
  providers: [
    DispatcherService,
    ToolCallHandler,
    AgencyFactory,
    threadCompactorFactoryProvider,
  ],
  exports: [AgencyFactory, DispatcherService, threadCompactorFactoryProvider],
})
export class EngineModule {}
