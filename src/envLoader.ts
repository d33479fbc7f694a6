/**
 * Environment Variable Loader Utility
 *
 * Loads the package's .env file for the build step, and resolves the
 * runtime switches mdtouch takes from the environment.
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { BuildInfo } from './buildInfo';

const RuntimeConfigSchema = z.object({
    debug: z.boolean().default(false),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

/**
 * Everything the dispatcher is configured with
 */
export type TouchConfig = BuildInfo & RuntimeConfig;

/**
 * Nearest directory at or above `startDir` holding a package.json
 */
export function findPackageRoot(startDir: string = __dirname): string | null {
    let dir = path.resolve(startDir);
    for (;;) {
        if (fs.existsSync(path.join(dir, 'package.json'))) {
            return dir;
        }
        const parent = path.dirname(dir);
        if (parent === dir) {
            return null;
        }
        dir = parent;
    }
}

/**
 * Load .env from the package root into process.env.
 * Variables already set in the environment are left alone.
 * Returns the path that was loaded, or null when there is none.
 */
export function loadEnv(startDir: string = __dirname): string | null {
    const root = findPackageRoot(startDir);
    if (!root) {
        return null;
    }

    const envPath = path.join(root, '.env');
    if (!fs.existsSync(envPath)) {
        return null;
    }

    const result = dotenv.config({ path: envPath });
    if (result.error) {
        throw result.error;
    }
    return envPath;
}

function isEnabled(value: string | undefined): boolean {
    return ['1', 'true', 'yes'].includes((value ?? '').trim().toLowerCase());
}

/**
 * Runtime switches from environment variables (MDTOUCH_DEBUG)
 */
export function getRuntimeConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
    return RuntimeConfigSchema.parse({
        debug: isEnabled(env.MDTOUCH_DEBUG),
    });
}
