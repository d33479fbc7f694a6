export const PROGRAM_NAME = 'mdtouch';

export const DESCRIPTION =
    'A tool to update file timestamps or create empty files, mimicking the Unix touch command.';

export const HELP_FLAGS: readonly string[] = ['-h', '-?'];

/**
 * Version banner printed when mdtouch runs without arguments
 */
export function bannerLines(buildDatetime: string): string[] {
    return [`${PROGRAM_NAME}  ${buildDatetime}`, DESCRIPTION];
}

export function helpMessage(): string {
    return `Usage: ${PROGRAM_NAME} [OPTIONS] <file> [file...]

A command line tool to mimic the behaviour of the Unix touch command on Windows.
If the file does not exist, it will be created. Otherwise, its access and modification
times will be updated to the current time.

Options:
  -h, -?      Display this help message and exit.
`;
}
