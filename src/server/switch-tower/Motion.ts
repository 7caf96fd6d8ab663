/**
 * @file Motion.ts
 * @description Primitive motion command formatting.
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

import type { Extruder } from '@/server/switch-tower/Extruder';

/** Compass headings in degrees, counter-clockwise from +X. */
export enum Heading {
	E = 0,
	NE = 45,
	N = 90,
	NW = 135,
	W = 180,
	SW = 225,
	S = 270,
	SE = 315,
}

export type Point = readonly [x: number, y: number];

export interface ExtrusionOptions {
	extruder: Extruder;
	/** Filament length per mm of travel. Defaults to `extruder.getFeedRate()`. */
	feedRate?: number;
	/** The move closes a path; extrusion is scaled by `extruder.pathClosingMultiplier`. */
	lastLine?: boolean;
}

/** Formats `n` with a fixed number of decimals, never producing a negative zero such as `-0.000`. */
export function fixed(n: number, digits: number): string {
	const s = n.toFixed(digits);
	return Number(s) === 0 ? (0).toFixed(digits) : s;
}

/** Formats a feed rate (mm/min): integral values without decimals, others with one. */
export function formatSpeed(speed: number): string {
	return Number.isInteger(speed) ? speed.toString() : fixed(speed, 1);
}

export function calculatePathLength(from: Point, to: Point): number {
	return Math.hypot(to[0] - from[0], to[1] - from[1]);
}

/** Absolute travel move of the head. */
export function genHeadMove(x: number, y: number, speed: number): string {
	return `G1 X${fixed(x, 3)} Y${fixed(y, 3)} F${formatSpeed(speed)}`;
}

/**
 * Relative move of `length` along `heading` (degrees). Axes whose component rounds to zero are omitted.
 * A negative `length` moves against the heading.
 */
export function genDirectionMove(heading: number, length: number, speed: number, extrusion?: ExtrusionOptions): string {
	const rad = (heading * Math.PI) / 180;
	const x = fixed(Math.cos(rad) * length, 3);
	const y = fixed(Math.sin(rad) * length, 3);

	let cmd = 'G1';
	if (Number(x) !== 0) {
		cmd += ` X${x}`;
	}
	if (Number(y) !== 0) {
		cmd += ` Y${y}`;
	}
	if (extrusion) {
		const { extruder, feedRate, lastLine } = extrusion;
		let e = Math.abs(length) * (feedRate ?? extruder.getFeedRate());
		if (lastLine) {
			e *= extruder.pathClosingMultiplier ?? 1;
		}
		cmd += ` E${fixed(e, 4)}`;
	}
	return cmd + ` F${formatSpeed(speed)}`;
}
