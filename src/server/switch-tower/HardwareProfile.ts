/**
 * @file HardwareProfile.ts
 * @description Purge and prime command tables per hardware configuration.
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
 * TUNING NOTES
 *
 * Every feed rate, distance and delay below was tuned on the physical hardware. They must be
 * reproduced exactly. Adding a hardware configuration means adding a template, not a branch.
 */

import { CommandLine } from '@/server/switch-tower/CommandLine';
import { HardwareConfig, isHardwareConfig } from '@/server/switch-tower/HardwareConfig';
import { fixed } from '@/server/switch-tower/Motion';
import { UnknownHardwareConfigError } from '@/server/switch-tower/errors';

export type PrepurgeSign = 1 | -1;

interface PrimeTrailTemplate {
	/** Added to the tower width before the sign is applied. */
	readonly xOffset: number;
	/** Filament per mm of tower width. */
	readonly ratio: number;
	readonly feed: number;
}

export interface HardwareProfileTemplate {
	/** Added to the base tower height. */
	readonly heightDelta: number;
	/** Added to the number of post-switch purge lines. */
	readonly purgeLineDelta: number;
	/**
	 * The Y shift following each pre-switch purge trail, indexed by the purge flip-flop state. Trails
	 * alternate between +X and -X, starting with +X.
	 */
	readonly preSwitchYShifts: Readonly<Record<'flip' | 'flop', readonly number[]>>;
	/** Drip, retract and cooling sequence closing the pre-switch purge. */
	readonly preSwitchTail: readonly CommandLine[];
	/** Filament feed lines after the tool change. */
	readonly postSwitchFeed: readonly CommandLine[];
	readonly primeTrail: PrimeTrailTemplate;
	/** The direction of the prime trail along X. */
	readonly prepurgeSign: PrepurgeSign;
}

export interface HardwareProfile {
	readonly hwConfig: HardwareConfig;
	readonly heightDelta: number;
	readonly purgeLineDelta: number;
	/** Pre-switch purge tables, keyed by the purge flip-flop state. */
	readonly preSwitchLines: Readonly<Record<'true' | 'false', readonly CommandLine[]>>;
	readonly postSwitchLines: readonly CommandLine[];
	readonly prepurgeSign: PrepurgeSign;
}

/** Pre-switch purge trail feed, mm of filament per mm of tower width. */
const PREPURGE_FEED_RATIO = 4.5 / 50;

const PTFE_PRE_SWITCH_TAIL: readonly CommandLine[] = [
	['G1 E-20 F3000', ' rapid retract'],
	['G4 P2500', ' 2.5s cooling period'],
	['G1 E-140 F3000', ' 50mm/s long retract'],
];

const PTFE_POST_SWITCH_FEED: readonly CommandLine[] = [
	['G1 E100 F3000', ' 50mm/s feed'],
	['G1 E54 F1500', ' 25mm/s feed'],
];

export const HARDWARE_PROFILE_TEMPLATES: Readonly<Record<HardwareConfig, HardwareProfileTemplate>> = {
	[HardwareConfig.PEEK]: {
		heightDelta: 0,
		purgeLineDelta: 0,
		preSwitchYShifts: {
			flip: [0.6, 1.4, 0.6, 1.4],
			flop: [1.4, 0.6, 1.4, 0.6],
		},
		preSwitchTail: [
			['G1 X10.000 E-20.0000 F1500', ' drip trail'],
			['G1 E-15 F1500', ' 25mm/s reshaping'],
			['G4 P2000', ' 2s cooling period'],
			['G1 E-95 F1500', ' 25mm/s long retract'],
		],
		postSwitchFeed: [['G1 E125 F1500', ' 25mm/s feed']],
		primeTrail: { xOffset: -10, ratio: 1.6 / 40, feed: 1500 },
		prepurgeSign: 1,
	},
	[HardwareConfig.PTFE]: {
		heightDelta: 0,
		purgeLineDelta: 0,
		preSwitchYShifts: {
			flip: [0.6, 1.4, 0.6, 1.4],
			flop: [1.4, 0.6, 1.4, 0.6],
		},
		preSwitchTail: PTFE_PRE_SWITCH_TAIL,
		postSwitchFeed: PTFE_POST_SWITCH_FEED,
		primeTrail: { xOffset: 0, ratio: 5 / 50, feed: 900 },
		prepurgeSign: 1,
	},
	[HardwareConfig.E3DV6]: {
		heightDelta: 2,
		purgeLineDelta: -1,
		preSwitchYShifts: {
			flip: [0.8, 1.4, 0.6, 1.4, 1],
			flop: [1.4, 0.6, 1.4, 0.6, 1.4],
		},
		preSwitchTail: PTFE_PRE_SWITCH_TAIL,
		postSwitchFeed: PTFE_POST_SWITCH_FEED,
		primeTrail: { xOffset: 0, ratio: 5 / 50, feed: 900 },
		prepurgeSign: -1,
	},
};

export function getHardwareProfileTemplate(hwConfig: string): HardwareProfileTemplate {
	if (!isHardwareConfig(hwConfig)) {
		throw new UnknownHardwareConfigError(hwConfig);
	}
	return HARDWARE_PROFILE_TEMPLATES[hwConfig];
}

function buildPreSwitchLines(
	width: number,
	yShifts: readonly number[],
	tail: readonly CommandLine[],
): readonly CommandLine[] {
	const feedLength = fixed(width * PREPURGE_FEED_RATIO, 4);
	const lines: CommandLine[] = [];
	yShifts.forEach((shift, i) => {
		const x = i % 2 === 0 ? width : -width;
		lines.push([`G1 X${fixed(x, 3)} E${feedLength} F6000`, ' purge trail']);
		lines.push([`G1 Y${shift} F3000`, ' Y shift']);
	});
	lines.push(...tail);
	return Object.freeze(lines);
}

function buildPostSwitchLines(width: number, template: HardwareProfileTemplate): readonly CommandLine[] {
	const { xOffset, ratio, feed } = template.primeTrail;
	const x = template.prepurgeSign * (width + xOffset);
	return Object.freeze([
		...template.postSwitchFeed,
		[`G1 X${fixed(x, 3)} E${fixed(width * ratio, 4)} F${feed}`, ' prime trail'] as const,
	]);
}

/** Builds the immutable purge/prime tables for a hardware configuration and tower width. */
export function buildHardwareProfile(hwConfig: HardwareConfig, width: number): HardwareProfile {
	const template = getHardwareProfileTemplate(hwConfig);
	return Object.freeze({
		hwConfig,
		heightDelta: template.heightDelta,
		purgeLineDelta: template.purgeLineDelta,
		preSwitchLines: Object.freeze({
			true: buildPreSwitchLines(width, template.preSwitchYShifts.flip, template.preSwitchTail),
			false: buildPreSwitchLines(width, template.preSwitchYShifts.flop, template.preSwitchTail),
		}),
		postSwitchLines: buildPostSwitchLines(width, template),
		prepurgeSign: template.prepurgeSign,
	});
}
