/**
 * Post-tsc build step: records BUILD_DATETIME (from the environment or the
 * package .env) in dist/build-info.json, which the published binary reads.
 */

import * as path from 'path';
import { writeBuildInfo } from '../src/buildInfo';
import { findPackageRoot, loadEnv } from '../src/envLoader';
import { createLogger } from '../src/logger';

const logger = createLogger('build');

function stamp(): void {
    const root = findPackageRoot(__dirname);
    if (!root) {
        throw new Error(`no package.json above ${__dirname}`);
    }

    const envPath = loadEnv(root);
    if (envPath) {
        logger.info(`loaded ${envPath}`);
    }

    const written = writeBuildInfo(path.join(root, 'dist'));
    logger.info(`wrote ${written}`);
}

stamp();
