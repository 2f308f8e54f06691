import * as path from "path";

export interface ServerConfig {
  port: number;
  uploadsDir: string;
  outputDir: string;
  maxUploadBytes: number;
}

function numberFromEnv(value: string | undefined, fallback: number): number {
  const parsed = value ? Number(value) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Server settings from the environment. Relative directories resolve against
 * the working directory.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: numberFromEnv(env.PORT, 3000),
    uploadsDir: path.resolve(env.UPLOAD_DIR || "uploads"),
    outputDir: path.resolve(env.OUTPUT_DIR || "output"),
    maxUploadBytes: numberFromEnv(env.MAX_UPLOAD_MB, 50) * 1024 * 1024,
  };
}
