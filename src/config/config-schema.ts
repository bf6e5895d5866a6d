import { z } from "zod";
import { LogLevel } from "../types/log-record.js";

const byteCount = z.number().int().min(0);

export const loggerNameSchema = z.string();

export const loggerOptionsSchema = z
  .object({
    prefix: z.string().optional(),

    // File sink
    logFilePath: z.string().min(1).nullable().optional(),
    logFileMaxBytes: byteCount.optional(),
    logFileBackupCount: z.number().int().min(0).optional(),

    // Cloud sink
    enableCloudLogging: z.boolean().optional(),
    cloudLoggerName: z.string().min(1).optional(),

    level: z.nativeEnum(LogLevel).optional(),
  })
  .strict();
