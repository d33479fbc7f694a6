/**
 * Line sinks for mdtouch's banner, usage text, error messages and log lines
 */
export interface Writer {
    writeLine(line: string): void;
}

export class StdoutWriter implements Writer {
    writeLine(line: string): void {
        process.stdout.write(line + '\n');
    }
}

export class StderrWriter implements Writer {
    writeLine(line: string): void {
        process.stderr.write(line + '\n');
    }
}

/**
 * Collects lines in memory; tests read them back with getOutput()
 */
export class BufferWriter implements Writer {
    private lines: string[] = [];

    writeLine(line: string): void {
        this.lines.push(line);
    }

    getOutput(): string {
        return this.lines.map((line) => line + '\n').join('');
    }
}
