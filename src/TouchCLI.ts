import { TouchConfig } from './envLoader';
import { TouchError } from './errors';
import { Logger, createLogger } from './logger';
import { HELP_FLAGS, bannerLines, helpMessage } from './messages';
import { touchFile } from './Toucher';
import { Writer } from './Writer';

export interface TouchCLIOptions {
    stdout: Writer;
    stderr: Writer;
    config: TouchConfig;
    logger?: Logger;
}

/**
 * Dispatches an mdtouch invocation: banner, help, or touching each path
 */
export class TouchCLI {
    private stdout: Writer;
    private stderr: Writer;
    private config: TouchConfig;
    private logger: Logger;

    constructor(options: TouchCLIOptions) {
        this.stdout = options.stdout;
        this.stderr = options.stderr;
        this.config = options.config;
        this.logger = options.logger ?? createLogger('mdtouch', {
            debug: options.config.debug,
            sink: options.stderr,
        });
    }

    /**
     * Run the invocation, throwing the first TouchError.
     * Paths after a failing one are never attempted.
     */
    run(args: string[]): void {
        if (args.length === 0) {
            for (const line of bannerLines(this.config.buildDatetime)) {
                this.stdout.writeLine(line);
            }
            return;
        }

        if (args.some((arg) => HELP_FLAGS.includes(arg))) {
            this.stdout.writeLine(helpMessage());
            return;
        }

        for (const filePath of args) {
            touchFile(filePath);
            this.logger.debug(`touched ${filePath}`);
        }
    }

    /**
     * Run the invocation and return the process exit code
     */
    exec(args: string[]): number {
        try {
            this.run(args);
            return 0;
        } catch (err) {
            if (err instanceof TouchError) {
                this.stderr.writeLine(err.message);
                return 1;
            }
            throw err;
        }
    }
}
