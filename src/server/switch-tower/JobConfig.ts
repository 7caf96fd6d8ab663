/**
 * @file JobConfig.ts
 * @description Schema of a tower job file.
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

import semver from 'semver';
import { z } from 'zod';
import { HardwareConfig } from '@/server/switch-tower/HardwareConfig';
import { JobConfigError } from '@/server/switch-tower/errors';

export const SUPPORTED_JOB_FORMAT_RANGE = '^1';

export const ExtruderConfig = z.object({
	tool: z.number().int().nonnegative(),
	retract: z.number().nonnegative(),
	retractSpeed: z.number().positive(),
	primeSpeed: z.number().positive().optional(),
	zHop: z.number().nonnegative().default(0),
	wipe: z.number().nonnegative().default(0),
	filamentDiameter: z.number().positive().default(1.75),
	extrusionWidth: z.number().positive().default(0.45),
	layerHeight: z.number().positive().default(0.2),
	extrusionMultiplier: z.number().positive().default(1),
	pathClosingMultiplier: z.number().positive().default(1),
});

export type ExtruderConfig = z.infer<typeof ExtruderConfig>;

export const LayerAction = z.enum(['switch', 'infill', 'none']);

export const LayerConfig = z.object({
	height: z.number().positive(),
	z: z.number().positive(),
	outerPerimeterSpeed: z.number().positive(),
	outerPerimeterFeedRate: z.number().positive(),
	action: LayerAction,
	/** The tool to change to, for `switch` layers. */
	tool: z.number().int().nonnegative().optional(),
	/** Logical extruder position the object G-code left before the tower. Defaults to 0. */
	extruderPosition: z.number().default(0),
});

export type LayerConfig = z.infer<typeof LayerConfig>;

export const JobConfig = z
	.object({
		formatVersion: z.string().refine((v) => semver.valid(semver.coerce(v)) !== null, {
			message: 'formatVersion must be a version number',
		}),
		hardware: z.nativeEnum(HardwareConfig),
		start: z.object({ x: z.number(), y: z.number() }),
		tower: z
			.object({
				width: z.number().positive().optional(),
				height: z.number().int().positive().optional(),
			})
			.default({}),
		travel: z.object({
			xySpeed: z.number().positive(),
			zSpeed: z.number().positive(),
			zHop: z.number().nonnegative().default(0),
		}),
		initialTool: z.number().int().nonnegative(),
		retractAfterRaft: z.boolean().default(true),
		extruders: z.array(ExtruderConfig).min(1),
		layers: z.array(LayerConfig).min(1),
	})
	.superRefine((job, ctx) => {
		const tools = new Set<number>();
		job.extruders.forEach((e, i) => {
			if (tools.has(e.tool)) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate tool ${e.tool}`, path: ['extruders', i] });
			}
			tools.add(e.tool);
		});
		if (!tools.has(job.initialTool)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `No extruder for initial tool ${job.initialTool}`,
				path: ['initialTool'],
			});
		}
		job.layers.forEach((layer, i) => {
			if (layer.action === 'switch' && layer.tool === undefined) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: 'A switch layer must name the tool to change to',
					path: ['layers', i, 'tool'],
				});
			}
		});
	});

export type JobConfig = z.infer<typeof JobConfig>;

/** Validates an already-parsed job document. */
export function parseJobConfig(data: unknown): JobConfig {
	const result = JobConfig.safeParse(data);
	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
		throw new JobConfigError(`Invalid job configuration. ${issues}`, result.error);
	}
	const version = semver.coerce(result.data.formatVersion);
	if (version === null || !semver.satisfies(version, SUPPORTED_JOB_FORMAT_RANGE)) {
		throw new JobConfigError(
			`Job format version ${result.data.formatVersion} is not supported (expected ${SUPPORTED_JOB_FORMAT_RANGE}).`,
		);
	}
	return result.data;
}
