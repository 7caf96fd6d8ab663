/**
 * @file CommandLine.ts
 * @description
 *
 * @license MIT
 * @copyright 2024
 *
 * THE SOFTWARE IS PROVIDED “AS IS”, WITHOUT WARRANTY OF ANY KIND, EXPRESS OR IMPLIED,
 * INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY, FITNESS FOR A PARTICULAR
 * PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE AUTHORS OR COPYRIGHT HOLDERS BE
 * LIABLE FOR ANY CLAIM, DAMAGES OR OTHER LIABILITY, WHETHER IN AN ACTION OF CONTRACT,
 * TORT OR OTHERWISE, ARISING FROM, OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE
 * USE OR OTHER DEALINGS IN THE SOFTWARE.
 */

/**
 * A single generated line: the command text and a comment, either of which may be absent.
 * Comments carry their own leading space (`' purge trail'`), matching G-code seen in the wild where
 * the `;` follows the command directly.
 *
 * A line with no command and a comment is a section marker only, such as `' TOWER START'`.
 */
export type CommandLine = readonly [command: string | null, comment: string | null];

/** An ordered producer of command lines. Consumers must preserve emission order. */
export type CommandLineGenerator = Generator<CommandLine, void, undefined>;

export function isSectionMarker(line: CommandLine): boolean {
	return line[0] === null && line[1] !== null;
}

/** Serializes a line to text, without any line terminator. */
export function serializeCommandLine([command, comment]: CommandLine): string {
	if (comment === null) {
		return command ?? '';
	}
	return (command ?? '') + ';' + comment;
}

/** Serializes lines lazily, appending `eol` to each. */
export function* serializeCommandLines(lines: Iterable<CommandLine>, eol = '\n'): Generator<string, void, undefined> {
	for (const line of lines) {
		yield serializeCommandLine(line) + eol;
	}
}
