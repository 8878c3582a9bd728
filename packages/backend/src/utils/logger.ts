import pino from "pino";
import { appConfig } from "../config.js";

export const logger = pino({
  level: appConfig.LOG_LEVEL
});

export function previewText(text: string, maxLength = 50): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
