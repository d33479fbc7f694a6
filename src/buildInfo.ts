/**
 * Build metadata stamped into dist/ by `npm run build` and read back by the
 * binary. The runtime environment never changes it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

export const DEFAULT_BUILD_DATETIME = '2025-02-03 10:00:00';
export const BUILD_INFO_FILE = 'build-info.json';

const BuildInfoSchema = z.object({
    buildDatetime: z.string().trim().min(1),
});

export type BuildInfo = z.infer<typeof BuildInfoSchema>;

/**
 * Where the binary looks for its build info: dist/build-info.json beside
 * dist/src/ once built, or an unstamped path at the repo root from sources
 */
export function defaultBuildInfoPath(): string {
    return path.join(__dirname, '..', BUILD_INFO_FILE);
}

/**
 * Build info for the banner; the default datetime when nothing was stamped
 */
export function readBuildInfo(filePath: string = defaultBuildInfoPath()): BuildInfo {
    if (!fs.existsSync(filePath)) {
        return { buildDatetime: DEFAULT_BUILD_DATETIME };
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`cannot read ${filePath}: ${reason}`, { cause: err });
    }

    const parsed = BuildInfoSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
            .join('; ');
        throw new Error(`invalid ${filePath}: ${issues}`);
    }
    return parsed.data;
}

/**
 * Build info from the builder's environment (BUILD_DATETIME)
 */
export function resolveBuildInfo(env: NodeJS.ProcessEnv): BuildInfo {
    return { buildDatetime: env.BUILD_DATETIME?.trim() || DEFAULT_BUILD_DATETIME };
}

/**
 * Stamp build info into `outDir`, returning the written path
 */
export function writeBuildInfo(outDir: string, env: NodeJS.ProcessEnv = process.env): string {
    const filePath = path.join(outDir, BUILD_INFO_FILE);
    fs.mkdirSync(outDir, { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(resolveBuildInfo(env), null, 2) + '\n');
    return filePath;
}
