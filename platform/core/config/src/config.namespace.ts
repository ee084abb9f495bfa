import { registerAs } from "@nestjs/config";
import type { SwitchboardConfig } from "@switchboard/types";
import { DEFAULT_CONFIG } from "./defaults";

export const CONFIG_NAMESPACE = "switchboard" as const;

export const switchboardConfig = registerAs(
  CONFIG_NAMESPACE,
  (): SwitchboardConfig => structuredClone(DEFAULT_CONFIG)
);
