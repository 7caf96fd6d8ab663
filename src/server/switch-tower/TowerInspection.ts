/**
 * @file TowerInspection.ts
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

import { z } from 'zod';
import { CommandLine, isSectionMarker } from '@/server/switch-tower/CommandLine';
import { parseCommonGCodeCommandLine } from '@/server/switch-tower/CommonGCodeCommand';

export const TOWER_INSPECTION_VERSION = 1;

export const TowerInspectionSchema = z.object({
	version: z.literal(TOWER_INSPECTION_VERSION),
	lineCount: z.number().int(),
	/** Section marker comments, trimmed, in order. */
	sections: z.array(z.string()),
	toolChangeCount: z.number().int(),
	usedTools: z.array(z.number().int()),
	purgeTrailCount: z.number().int(),
	/** Sum of positive E values. All E values are taken as relative. */
	totalExtruded: z.number(),
	/** Sum of the magnitudes of negative E values. */
	totalRetracted: z.number(),
	totalDwellMs: z.number(),
	maxZ: z.number().optional(),
	/** True when the last positioning mode command was `G90`, or there was none. */
	endsAbsolute: z.boolean(),
});

export type TowerInspection = z.infer<typeof TowerInspectionSchema>;

/** Summarizes generated tower lines. */
export function inspectTowerLines(lines: Iterable<CommandLine>): TowerInspection {
	let lineCount = 0;
	const sections: string[] = [];
	const usedTools: number[] = [];
	let toolChangeCount = 0;
	let purgeTrailCount = 0;
	let totalExtruded = 0;
	let totalRetracted = 0;
	let totalDwellMs = 0;
	let maxZ: number | undefined = undefined;
	let endsAbsolute = true;

	for (const line of lines) {
		++lineCount;
		const [command, comment] = line;

		if (isSectionMarker(line)) {
			sections.push((comment ?? '').trim());
			continue;
		}
		if (comment === ' purge trail') {
			++purgeTrailCount;
		}
		if (command === null) {
			continue;
		}

		const cmd = parseCommonGCodeCommandLine(command);
		if (!cmd) {
			continue;
		}

		if (cmd.letter === 'T') {
			++toolChangeCount;
			const tool = Number(cmd.value);
			if (!usedTools.includes(tool)) {
				usedTools.push(tool);
			}
			continue;
		}

		switch (cmd.value) {
			case '1':
				if (cmd.e) {
					const e = Number(cmd.e);
					if (e > 0) {
						totalExtruded += e;
					} else {
						totalRetracted -= e;
					}
				}
				if (cmd.z) {
					const z = Number(cmd.z);
					maxZ = maxZ === undefined ? z : Math.max(maxZ, z);
				}
				break;
			case '4':
				totalDwellMs += Number(cmd.p ?? 0);
				break;
			case '90':
				endsAbsolute = true;
				break;
			case '91':
				endsAbsolute = false;
				break;
		}
	}

	return TowerInspectionSchema.parse({
		version: TOWER_INSPECTION_VERSION,
		lineCount,
		sections,
		toolChangeCount,
		usedTools,
		purgeTrailCount,
		totalExtruded,
		totalRetracted,
		totalDwellMs,
		maxZ,
		endsAbsolute,
	});
}
