import type { PlatformSettings } from "../config/batchConfig.js";
import { ConfigError } from "../core/errors.js";
import { IcaCliPlatformClient } from "./icaCli.js";
import { SimulatedPlatformClient } from "./simulated.js";
import type { PlatformClient } from "./types.js";

export function createPlatformClient(settings: PlatformSettings): PlatformClient {
  if (settings.kind === "simulated") {
    return new SimulatedPlatformClient({ runningPolls: settings.simulatedRunningPolls });
  }
  if (!settings.projectName) {
    throw new ConfigError("platform.project_name is required for the ica_cli platform");
  }
  return new IcaCliPlatformClient({
    projectName: settings.projectName,
    cliPath: settings.cliPath,
    commandTimeoutMs: settings.commandTimeoutMs
  });
}
