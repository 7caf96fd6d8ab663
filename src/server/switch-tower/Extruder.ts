/**
 * @file Extruder.ts
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

import { CommandLine } from '@/server/switch-tower/CommandLine';
import { fixed } from '@/server/switch-tower/Motion';

/** Per-material data the tower generator reads from the active (or outgoing/incoming) extruder. */
export interface Extruder {
	/** Tool index used in the `Tn` tool change command. */
	readonly tool: number;
	/** Retract length, mm of filament. */
	readonly retract: number;
	/** Retract speed, mm/min. */
	readonly retractSpeed: number;
	/** Z lift applied on travel moves. Zero disables z-hop. */
	readonly zHop: number;
	/** Wipe distance after retraction. Zero disables the wipe. */
	readonly wipe: number;
	/** Extrusion scale applied to path-closing segments. */
	readonly pathClosingMultiplier?: number;

	/** Filament length per mm of head travel. */
	getFeedRate(multiplier?: number): number;
	getPrimeGcode(change?: number): CommandLine;
	getRetractGcode(): CommandLine;
}

export interface ExtruderProfileOptions {
	tool: number;
	retract: number;
	retractSpeed: number;
	primeSpeed?: number;
	zHop?: number;
	wipe?: number;
	filamentDiameter?: number;
	extrusionWidth?: number;
	layerHeight?: number;
	extrusionMultiplier?: number;
	pathClosingMultiplier?: number;
}

export class ExtruderProfile implements Extruder {
	constructor(opts: ExtruderProfileOptions) {
		this.tool = opts.tool;
		this.retract = opts.retract;
		this.retractSpeed = opts.retractSpeed;
		this.primeSpeed = opts.primeSpeed ?? opts.retractSpeed;
		this.zHop = opts.zHop ?? 0;
		this.wipe = opts.wipe ?? 0;
		this.filamentDiameter = opts.filamentDiameter ?? 1.75;
		this.extrusionWidth = opts.extrusionWidth ?? 0.45;
		this.layerHeight = opts.layerHeight ?? 0.2;
		this.extrusionMultiplier = opts.extrusionMultiplier ?? 1;
		this.pathClosingMultiplier = opts.pathClosingMultiplier ?? 1;
	}

	readonly tool: number;
	readonly retract: number;
	readonly retractSpeed: number;
	readonly primeSpeed: number;
	readonly zHop: number;
	readonly wipe: number;
	readonly filamentDiameter: number;
	readonly extrusionWidth: number;
	readonly layerHeight: number;
	readonly extrusionMultiplier: number;
	readonly pathClosingMultiplier: number;

	getFeedRate(multiplier = 1): number {
		const filamentArea = Math.PI * (this.filamentDiameter / 2) ** 2;
		return ((this.extrusionWidth * this.layerHeight) / filamentArea) * this.extrusionMultiplier * multiplier;
	}

	getPrimeGcode(change = 0): CommandLine {
		return [`G1 E${fixed(this.retract + change, 4)} F${fixed(this.primeSpeed, 1)}`, ' prime'];
	}

	getRetractGcode(): CommandLine {
		return [`G1 E${fixed(-this.retract, 4)} F${fixed(this.retractSpeed, 1)}`, ' retract'];
	}
}
