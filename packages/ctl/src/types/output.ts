/**
 * Line-oriented writer for operator-facing messages.
 */
export interface Output {
	/** Write one line to standard output */
	stdout(line: string): void;
	/** Write one line to standard error */
	stderr(line: string): void;
}
