import "dotenv/config";

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { logger } from "./core/logger.js";
import { createRuntime } from "./runtime.js";

const config = loadConfig();
const { conductor, services } = createRuntime(config);

const { server, limiter } = createApp(conductor, {
  maxEventBytes: config.maxEventBytes,
  rateLimitPerMinute: config.sessionRateLimitPerMin,
  services,
});

const sweep = setInterval(() => {
  conductor.sweepSessions();
  limiter.sweep();
}, config.sessionSweepIntervalMs);
sweep.unref();

server.listen(config.port, () => {
  logger.info(
    `media conductor listening on port ${config.port} using provider=${config.provider.modelProvider}`,
  );
});
