import { z } from "zod";
import { LOG_LEVELS, LogLevel } from "../observability/types";

export const configFileSchema = z
  .object({
    baseUrl: z.string().url(),
    userAgent: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    skipInvalidRecords: z.boolean(),
    logLevel: z.enum(LOG_LEVELS),
    color: z.boolean(),
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof configFileSchema>;

export interface AppConfig {
  baseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  skipInvalidRecords: boolean;
  logLevel: LogLevel;
  color: boolean;
}
