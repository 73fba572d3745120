import pino from "pino";
import { config } from "./config";

export const logger = pino({
  name: "vestlock-keeper",
  level: config.log.level,
  ...(config.log.pretty && {
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: true,
      },
    },
  }),
});
