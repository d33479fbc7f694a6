#!/usr/bin/env node

import { readBuildInfo } from './buildInfo';
import { TouchConfig, getRuntimeConfigFromEnv } from './envLoader';
import { createLogger } from './logger';
import { TouchCLI } from './TouchCLI';
import { StderrWriter, StdoutWriter, Writer } from './Writer';

export interface MainOptions {
    stdout?: Writer;
    stderr?: Writer;
    env?: NodeJS.ProcessEnv;
    /** Stamped build info to read instead of the one shipped in dist/ */
    buildInfoPath?: string;
}

/**
 * Main entry point, returns the exit code
 */
export function main(argv: string[], options: MainOptions = {}): number {
    const stdout = options.stdout ?? new StdoutWriter();
    const stderr = options.stderr ?? new StderrWriter();

    let config: TouchConfig;
    try {
        config = {
            ...readBuildInfo(options.buildInfoPath),
            ...getRuntimeConfigFromEnv(options.env ?? process.env),
        };
    } catch (err) {
        stderr.writeLine(`mdtouch: ${err instanceof Error ? err.message : String(err)}`);
        return 1;
    }

    const logger = createLogger('mdtouch', { debug: config.debug, sink: stderr });
    const cli = new TouchCLI({ stdout, stderr, config, logger });
    return cli.exec(argv);
}

// Run the CLI
if (require.main === module) {
    process.exitCode = main(process.argv.slice(2));
}
