/**
 * @file CommonGCodeCommand.ts
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

export interface CommonGCodeCommand {
	/** The command letter, such as 'G' or 'T'. Always normalized to upper case. */
	readonly letter: string;
	/** The command value, such as '1' for 'G1'. Note that G0 and G1 are normalized to value '1' for easier conditional handling. */
	readonly value: string;
	readonly x?: string;
	readonly y?: string;
	readonly e?: string;
	readonly z?: string;
	readonly f?: string;
	/** Dwell time of `G4`, in milliseconds. */
	readonly p?: string;
}

const rxCommand = /^\s*([GT])\s*(\d+)(?=\D|$)([^;]*)/i;
const rxArg = /([XYEZFP])\s*([+-]?[\d.]+)/gi;

type ArgKey = 'x' | 'y' | 'e' | 'z' | 'f' | 'p';

function isArgKey(key: string): key is ArgKey {
	return key === 'x' || key === 'y' || key === 'e' || key === 'z' || key === 'f' || key === 'p';
}

/**
 * Parses a single G-code command line, parsing only the commands and arguments the tower generator emits:
 * `G0`/`G1` moves, `G4` dwells, `G90`/`G91`/`G92` and `Tn`. Anything after `;` is ignored. This is *not* a
 * full-featured parser.
 */
export function parseCommonGCodeCommandLine(line: string): CommonGCodeCommand | null {
	const m = rxCommand.exec(line);
	if (!m) {
		return null;
	}

	const letter = m[1].toUpperCase();
	if (letter === 'T') {
		return { letter, value: String(Number(m[2])) };
	}

	const value = m[2] === '0' ? '1' : String(Number(m[2]));
	const args: { -readonly [K in ArgKey]?: string } = {};
	for (const arg of m[3].matchAll(rxArg)) {
		const key = arg[1].toLowerCase();
		if (isArgKey(key)) {
			args[key] ??= arg[2];
		}
	}
	return { letter, value, ...args };
}
