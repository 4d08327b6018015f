import pino from "pino";
import { config } from "./config";

const logger = pino({
  name: "dialplan",
  level: config.logLevel,
  base: { env: config.nodeEnv },
});

export default logger;
