import { createInterface, type Interface } from "node:readline";
import { trimWhitespace } from "../content/slug.js";
import { InputError } from "../errors.js";

/**
 * Line-oriented question/answer over any readable text stream.
 *
 * Lines are buffered by the readline iterator, so input that arrives before
 * a question is asked is not lost.
 */
export class LinePrompter {
	private readonly rl: Interface;
	private readonly lines: AsyncIterator<string>;

	constructor(
		input: NodeJS.ReadableStream,
		private readonly output: NodeJS.WritableStream,
	) {
		this.rl = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY, terminal: false });
		this.lines = this.rl[Symbol.asyncIterator]();
	}

	/**
	 * Write `prompt` on its own line and read one trimmed answer.
	 * End of input reads as an empty answer.
	 */
	async ask(prompt: string): Promise<string> {
		this.output.write(`${prompt}\n`);
		let next: IteratorResult<string>;
		try {
			next = await this.lines.next();
		} catch (err) {
			throw new InputError("failed reading input from user", { cause: err });
		}
		return next.done ? "" : trimWhitespace(next.value);
	}

	close(): void {
		this.rl.close();
	}
}
