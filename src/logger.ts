import pino from "pino";

// stdout belongs to reports and the MCP stdio transport
export const logger = pino(
  {
    name: "scan-fusion",
    level: process.env.SCAN_FUSION_LOG_LEVEL || "info",
  },
  pino.destination(2)
);

export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
}
