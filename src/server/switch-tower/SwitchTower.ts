/**
 * @file SwitchTower.ts
 * @description The purge tower state machine.
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

import type { Logger } from 'pino';
import { CommandLine, CommandLineGenerator } from '@/server/switch-tower/CommandLine';
import { Extruder } from '@/server/switch-tower/Extruder';
import { HardwareConfig } from '@/server/switch-tower/HardwareConfig';
import { buildHardwareProfile, HardwareProfile, PrepurgeSign } from '@/server/switch-tower/HardwareProfile';
import { Layer } from '@/server/switch-tower/Layer';
import {
	calculatePathLength,
	fixed,
	genDirectionMove,
	genHeadMove,
	Heading,
} from '@/server/switch-tower/Motion';
import { InvalidTowerGeometryError } from '@/server/switch-tower/errors';

export interface TowerGeometryOptions {
	/** Tower width along X. Defaults to 50. */
	width?: number;
	/** Base tower depth along Y, before any hardware-specific delta. Must be even. Defaults to 14. */
	height?: number;
}

interface CommonLayerParams {
	layer: Layer;
	/** Current logical extruder position. Negative when the filament is already retracted. */
	ePos: number;
	/** The hop height the object G-code is travelling at, relative to `layer.z`. */
	zHop: number;
	zSpeed: number;
	xySpeed: number;
}

export interface TowerParams extends CommonLayerParams {
	oldExtruder: Extruder;
	newExtruder: Extruder;
}

export interface InfillParams extends CommonLayerParams {
	extruder: Extruder;
}

const RAFT_Z = 0.2;
const PURGE_SPEED = 2400;
const SHIFT_SPEED = 3000;

/**
 * Generates the purge tower: a raft once per job, then a tower block on every layer with a tool change
 * and an infill block on every other layer the tower must grow on.
 *
 * Successive tower blocks alternate between two purge zones (see {@link flipflopPurge}) and successive
 * infill blocks alternate the wall orientation (see {@link flipflopInfill}), so consecutive layers
 * interlock. The generators must be consumed fully, once each, in ascending layer order: the tower Z
 * and the flip-flops advance as the lines are produced.
 */
export class SwitchTower {
	constructor(
		public readonly startPosX: number,
		public readonly startPosY: number,
		logger: Logger,
		public readonly hwConfig: HardwareConfig,
		geometry?: TowerGeometryOptions,
	) {
		this.#log = logger;

		this.width = geometry?.width ?? 50;
		this.#profile = buildHardwareProfile(hwConfig, this.width);
		this.height = (geometry?.height ?? 14) + this.#profile.heightDelta;

		if (!Number.isInteger(this.height) || this.height % 2 !== 0) {
			throw new InvalidTowerGeometryError(`Tower height must be an even integer, got ${this.height}.`);
		}

		this.wallWidth = this.width + 2.4;
		this.wallHeight = this.height + 1;
		this.raftWidth = this.width + 4;
		this.raftHeight = this.height + 2;
		this.raftPosX = this.startPosX - 2;
		this.raftPosY = this.startPosY - 1.2;

		this.purgeLineLength = this.width + 0.6;
		this.purgeLines = Math.trunc(Math.abs(this.height / 2)) - 1 + this.#profile.purgeLineDelta;
		if (this.purgeLines < 0) {
			throw new InvalidTowerGeometryError(`Tower height ${this.height} leaves no room for purge lines.`);
		}
	}

	#log: Logger;
	#profile: HardwareProfile;

	readonly width: number;
	readonly height: number;
	readonly wallWidth: number;
	readonly wallHeight: number;
	readonly raftWidth: number;
	readonly raftHeight: number;
	readonly raftPosX: number;
	readonly raftPosY: number;
	readonly purgeLineLength: number;
	readonly purgeLines: number;

	/** Z of the most recently started tower layer. */
	lastTowerZ = 0;
	/** Selects the purge zone and Y shift pattern of the next tower block. */
	flipflopPurge = false;
	/** Selects the wall orientation and zig-zag phase of the next infill block. */
	flipflopInfill = false;

	get prepurgeSign(): PrepurgeSign {
		return this.#profile.prepurgeSign;
	}

	get postSwitchLines(): readonly CommandLine[] {
		return this.#profile.postSwitchLines;
	}

	preSwitchLines(flip: boolean): readonly CommandLine[] {
		return this.#profile.preSwitchLines[flip ? 'true' : 'false'];
	}

	/**
	 * Speeds for the post-switch purge lines, one per purge line.
	 *
	 * NOTE: `minSpeed` is currently never selected, every line purges at 2400. The ramp towards `minSpeed`
	 * is disabled on the tuned hardware and is kept that way until the tuning is revisited.
	 */
	generatePurgeSpeeds(minSpeed: number): number[] {
		let speed = minSpeed;
		const minSpeedLines = 0;
		const purgeSpeeds: number[] = [];
		for (let i = 0; i < this.purgeLines; i++) {
			if (i >= minSpeedLines) {
				speed = PURGE_SPEED;
			}
			purgeSpeeds.unshift(speed);
		}
		return purgeSpeeds;
	}

	/** Retracts whatever the object G-code left unretracted, up to the configured retract length. */
	getRetraction(ePos: number, extruder: Extruder): CommandLine | undefined {
		let retraction = extruder.retract + ePos;
		this.#log.debug({ retraction, ePos }, 'Retraction to add');
		if (Number(retraction.toFixed(3)) === 0) {
			return undefined;
		}
		if (retraction > extruder.retract) {
			retraction = extruder.retract;
		}
		return [`G1 E${fixed(-retraction, 4)} F${fixed(extruder.retractSpeed, 1)}`, ' tower retract'];
	}

	/** Lifts to the tower's hop height, unless the head is already there. */
	getZHop(layer: Layer, zHop: number, zSpeed: number, extruder: Extruder): CommandLine | undefined {
		if (extruder.zHop) {
			const newZHop = this.lastTowerZ + extruder.zHop;
			if (newZHop !== layer.z + zHop) {
				return [`G1 Z${fixed(newZHop, 3)} F${fixed(zSpeed, 1)}`, ' z-hop'];
			}
		}
		return undefined;
	}

	wallPositionLine(flip: boolean, xySpeed: number): CommandLine {
		const x = this.startPosX - 1.2;
		let y = this.startPosY - 0.5;
		if (!flip) {
			y += this.wallHeight;
		}
		return [genHeadMove(x, y, xySpeed), ' move to purge zone'];
	}

	/**
	 * The wall around the purge zone, in relative coordinates from {@link wallPositionLine}. The last side
	 * stops short of the start so the path does not overlap itself.
	 */
	*wallLines(flip: boolean, extruder: Extruder, wallSpeed: number, feedRate: number): CommandLineGenerator {
		const lastY = this.wallHeight - 0.3;
		const extrusion = { extruder, feedRate };
		const [across, back] = flip ? [Heading.N, Heading.S] : [Heading.S, Heading.N];
		yield [genDirectionMove(Heading.E, this.wallWidth, wallSpeed, extrusion), ' wall'];
		yield [genDirectionMove(across, this.wallHeight, wallSpeed, extrusion), ' wall'];
		yield [genDirectionMove(Heading.W, this.wallWidth, wallSpeed, extrusion), ' wall'];
		yield [genDirectionMove(back, lastY, wallSpeed, { ...extrusion, lastLine: true }), ' wall'];
	}

	/**
	 * The raft under the tower. Consumed once per job, before any tower or infill block.
	 * @param firstLayer the first object layer; the raft is always printed at Z 0.2
	 * @param retract whether to retract after the raft
	 */
	*raftLines(
		firstLayer: Layer,
		extruder: Extruder,
		retract: boolean,
		xySpeed: number,
		zSpeed: number,
	): CommandLineGenerator {
		this.#log.debug({ firstLayerZ: firstLayer.z }, 'Adding purge tower raft');
		yield [null, ' TOWER RAFT START'];
		if (extruder.zHop) {
			const zHop = RAFT_Z + extruder.zHop;
			yield [`G1 Z${fixed(zHop, 3)} F${zSpeed}`, ' z-hop'];
		}
		yield [genHeadMove(this.raftPosX - 0.4, this.raftPosY - 0.4, xySpeed), ' move to raft zone'];
		yield [`G1 Z${RAFT_Z} F${Math.trunc(zSpeed)}`, ' move z close'];
		yield ['G91', ' relative positioning'];

		// Three nested perimeters, each 0.4 inside the last.
		let width = this.raftWidth + 0.8;
		let height = this.raftHeight + 0.8;
		const speed = 2000;
		const perimeter = { extruder };
		yield [genDirectionMove(Heading.E, width, speed, perimeter), ' raft wall'];
		yield [genDirectionMove(Heading.N, height, speed, perimeter), ' raft wall'];
		yield [genDirectionMove(Heading.W, width, speed, perimeter), ' raft wall'];
		width -= 0.4;
		height -= 0.4;
		yield [genDirectionMove(Heading.S, height, speed, perimeter), ' raft wall'];
		yield [genDirectionMove(Heading.E, width, speed, perimeter), ' raft wall'];
		height -= 0.4;
		yield [genDirectionMove(Heading.N, height, speed, perimeter), ' raft wall'];
		width -= 0.4;
		height -= 0.4;
		yield [genDirectionMove(Heading.W, width, speed, perimeter), ' raft wall'];
		yield [genDirectionMove(Heading.S, height, speed, perimeter), ' raft wall'];

		yield [genDirectionMove(Heading.SE, 0.6, xySpeed), null];

		const fill = { extruder, feedRate: extruder.getFeedRate(1.3) };
		const fillSpeed = 1000;
		for (let i = 0; i < Math.trunc(this.raftWidth / 2); i++) {
			yield [genDirectionMove(Heading.N, this.raftHeight, fillSpeed, fill), ' raft1'];
			yield [genDirectionMove(Heading.E, 1, fillSpeed), ' raft2'];
			yield [genDirectionMove(Heading.S, this.raftHeight, fillSpeed, fill), ' raft3'];
			yield [genDirectionMove(Heading.E, 1, fillSpeed), ' raft4'];
		}

		if (retract) {
			yield extruder.getRetractGcode();
		}
		yield ['G90', ' absolute positioning'];
		yield [null, ' TOWER RAFT END'];
		this.lastTowerZ = RAFT_Z;
	}

	/** A tower block: purges the outgoing material, changes tool, primes and purges the incoming one. */
	*towerLines({ layer, ePos, oldExtruder, newExtruder, zHop, zSpeed, xySpeed }: TowerParams): CommandLineGenerator {
		this.#log.debug({ layerZ: layer.z, tool: newExtruder.tool }, 'Adding purge tower');
		yield [null, ' TOWER START'];

		const [minSpeed, feedRate] = layer.getOuterPerimeterRates();

		const retraction = this.getRetraction(ePos, oldExtruder);
		if (retraction) {
			yield retraction;
		}

		let hop = this.getZHop(layer, zHop, zSpeed, oldExtruder);
		if (hop) {
			yield hop;
		}

		this.lastTowerZ += layer.height;
		if (this.flipflopPurge) {
			yield [genHeadMove(this.startPosX - 0.6, this.startPosY + 0.2, xySpeed), ' move to purge zone'];
		} else {
			yield [genHeadMove(this.startPosX + 0.6, this.startPosY, xySpeed), ' move to purge zone'];
		}

		yield [`G1 Z${fixed(this.lastTowerZ, 3)} F${fixed(zSpeed, 1)}`, ' move z close'];
		yield ['G91', ' relative positioning'];
		yield oldExtruder.getPrimeGcode(-0.1);

		yield* this.preSwitchLines(this.flipflopPurge);

		yield [`T${newExtruder.tool}`, ' change tool'];

		yield* this.postSwitchLines;

		// Post-switch purge, heading back against the prime trail first.
		const purge = { extruder: newExtruder, feedRate: newExtruder.getFeedRate(1.2) };
		const purgeLength = this.purgeLineLength * this.prepurgeSign;
		const [dir1, dir2] = this.prepurgeSign === 1 ? [Heading.W, Heading.E] : [Heading.E, Heading.W];
		const [shift1, shift2] = this.flipflopPurge ? [0.6, 0.9] : [0.9, 0.6];

		for (const speed of this.generatePurgeSpeeds(minSpeed)) {
			yield [genDirectionMove(Heading.N, shift1, SHIFT_SPEED), ' Y shift'];
			yield [genDirectionMove(dir1, purgeLength, speed, purge), ' purge trail'];
			yield [genDirectionMove(Heading.N, shift2, SHIFT_SPEED), ' Y shift'];
			yield [genDirectionMove(dir2, purgeLength, speed, purge), ' purge trail'];
		}

		yield [genDirectionMove(Heading.N, shift1, SHIFT_SPEED), ' Y shift'];
		yield [genDirectionMove(dir1, purgeLength, PURGE_SPEED, { extruder: newExtruder, feedRate }), ' purge trail'];
		let direction: number = dir1;

		if (this.hwConfig === HardwareConfig.E3DV6) {
			// Extra volume for the E3D V6 melt zone.
			yield [genDirectionMove(Heading.N, shift2, SHIFT_SPEED), ' Y shift'];
			yield [genDirectionMove(dir2, purgeLength, minSpeed, { extruder: newExtruder, feedRate }), ' purge trail'];
			direction = dir2;
		}

		yield ['G90', ' absolute positioning'];
		yield this.wallPositionLine(false, xySpeed);
		yield ['G91', ' relative positioning'];

		yield* this.wallLines(false, newExtruder, minSpeed, feedRate);

		yield newExtruder.getRetractGcode();
		if (newExtruder.wipe) {
			yield [genDirectionMove(direction + 180, newExtruder.wipe, SHIFT_SPEED), ' wipe'];
		}

		yield ['G90', ' absolute positioning'];
		yield ['G92 E0', ' reset extruder position'];
		hop = this.getZHop(layer, zHop, zSpeed, oldExtruder);
		if (hop) {
			yield hop;
		}
		yield [null, ' TOWER END'];

		this.flipflopPurge = !this.flipflopPurge;
	}

	/** An infill block: grows the tower on a layer without a tool change. */
	*infillLines({ layer, ePos, extruder, zHop, zSpeed, xySpeed }: InfillParams): CommandLineGenerator {
		this.#log.debug({ layerZ: layer.z }, 'Adding purge tower infill');
		yield [null, ' TOWER INFILL START'];

		const [minSpeed, feedRate] = layer.getOuterPerimeterRates();

		const retraction = this.getRetraction(ePos, extruder);
		if (retraction) {
			yield retraction;
		}

		let hop = this.getZHop(layer, zHop, zSpeed, extruder);
		if (hop) {
			yield hop;
		}
		this.lastTowerZ += layer.height;

		yield this.wallPositionLine(this.flipflopInfill, xySpeed);
		yield [`G1 Z${fixed(this.lastTowerZ, 3)} F${fixed(zSpeed, 1)}`, ' move z close'];
		yield ['G91', ' relative positioning'];
		yield extruder.getPrimeGcode();

		const infillX = this.wallWidth / 6;
		const infillY = this.wallHeight - 0.3;
		const infillAngle = (Math.atan(infillY / infillX) * 180) / Math.PI;
		const infillPathLength = calculatePathLength([0, 0], [infillX, infillY]);

		yield* this.wallLines(this.flipflopInfill, extruder, PURGE_SPEED, feedRate);

		const step = (PURGE_SPEED - minSpeed) / 4;
		const speeds = [0, 1, 2, 3].map((i) => PURGE_SPEED - i * step);
		speeds.push(minSpeed, minSpeed);

		let flip = this.flipflopInfill;
		let direction = infillAngle;
		let remaining = speeds.length;
		for (const speed of speeds) {
			remaining--;
			direction = flip ? infillAngle : 360 - infillAngle;
			yield [
				genDirectionMove(direction, infillPathLength, speed, { extruder, feedRate, lastLine: remaining === 0 }),
				' infill',
			];
			flip = !flip;
		}

		yield extruder.getRetractGcode();
		if (extruder.wipe) {
			yield [genDirectionMove(direction + 180, extruder.wipe, 2000), ' wipe'];
		}

		yield ['G90', ' absolute positioning'];
		hop = this.getZHop(layer, zHop, zSpeed, extruder);
		if (hop) {
			yield hop;
		}
		yield ['G92 E0', ' reset extruder position'];
		yield [null, ' TOWER INFILL END'];

		this.flipflopInfill = !this.flipflopInfill;
	}
}

