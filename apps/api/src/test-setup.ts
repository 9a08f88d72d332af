import { Logger } from "@nestjs/common";

// Quiet Nest loggers and keep a developer's shell from changing test config.
Logger.overrideLogger(false);

for (const key of ["AUTOPILOT_MODE", "AUTOPILOT_BROKER_URL", "AUTOPILOT_BROKER_TOKEN", "AUTOPILOT_API_KEY", "PORT", "HOST"]) {
  delete process.env[key];
}
