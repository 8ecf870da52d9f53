/**
 * Environment configuration
 */

import { readFileSync } from "fs";
import { z } from "zod";

const envSchema = z.object({
    IDENTICON_OUTPUT_DIR: z.string().min(1, "IDENTICON_OUTPUT_DIR must not be empty").optional(),
    ENABLE_PERF_LOGS: z.string().optional(), // Only "1" turns logs on
    VERSION: z.string().min(1).optional(),
});

export interface IdenticonConfig {
    outputDir: string; // Directory that relative output names resolve against
    perfLogs: boolean; // Log per-stage timings to stderr
    version: string;
}

/**
 * Reads the package version, or "unknown" when package.json cannot be read
 */
function packageVersion(): string {
    try {
        const packageJson: unknown = JSON.parse(
            readFileSync(new URL("../../package.json", import.meta.url), "utf-8")
        );
        const parsed = z.object({ version: z.string() }).safeParse(packageJson);
        return parsed.success ? parsed.data.version : "unknown";
    } catch {
        return "unknown";
    }
}

/**
 * Parses configuration from the environment
 * @throws ZodError when IDENTICON_OUTPUT_DIR or VERSION is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IdenticonConfig {
    const parsed = envSchema.parse(env);
    return {
        outputDir: parsed.IDENTICON_OUTPUT_DIR ?? process.cwd(),
        perfLogs: parsed.ENABLE_PERF_LOGS === "1",
        version: parsed.VERSION ?? packageVersion(),
    };
}
