/**
 * @file switch-tower.ts
 * @description Public API of the purge tower generator.
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

import { createWriteStream, existsSync } from 'node:fs';
import { access, constants, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { Logger } from 'pino';
import { CommandLine, CommandLineGenerator, serializeCommandLines } from '@/server/switch-tower/CommandLine';
import { ExtruderProfile } from '@/server/switch-tower/Extruder';
import { JobConfig, parseJobConfig } from '@/server/switch-tower/JobConfig';
import { LayerInfo } from '@/server/switch-tower/Layer';
import { SwitchTower } from '@/server/switch-tower/SwitchTower';
import { inspectTowerLines, TowerInspection } from '@/server/switch-tower/TowerInspection';
import { JobConfigError, JobSequenceError } from '@/server/switch-tower/errors';

interface TowerStep {
	layer: LayerInfo;
	ePos: number;
	action: 'switch' | 'infill';
	/** The active extruder when the block starts. */
	extruder: ExtruderProfile;
	/** The extruder a `switch` block changes to. */
	next: ExtruderProfile;
}

/**
 * Produces the whole tower for a job: the raft, then one block per layer that needs one, in layer order.
 * The job plays the role of the layer pipeline: it tracks the active extruder and rejects layer sequences
 * the tower cannot be printed in.
 *
 * The tower geometry and the layer sequence are checked when this is called, before any line is produced.
 */
export function runTowerJob(job: JobConfig, logger: Logger): CommandLineGenerator {
	const tower = new SwitchTower(job.start.x, job.start.y, logger, job.hardware, job.tower);
	const extruders = new Map(job.extruders.map((e) => [e.tool, new ExtruderProfile(e)] as const));

	const getExtruder = (tool: number, layerIndex: number) => {
		const extruder = extruders.get(tool);
		if (!extruder) {
			throw new JobSequenceError(`No extruder is configured for tool ${tool}.`, layerIndex);
		}
		return extruder;
	};

	const initial = getExtruder(job.initialTool, 0);
	const layers = job.layers.map((l) => new LayerInfo(l.height, l.z, l.outerPerimeterSpeed, l.outerPerimeterFeedRate));

	let active = initial;
	let lastZ = -Infinity;
	const steps: TowerStep[] = [];
	for (const [i, layerConfig] of job.layers.entries()) {
		const layer = layers[i];
		if (layer.z <= lastZ) {
			throw new JobSequenceError(`Layer ${i} at Z ${layer.z} is not above the previous layer (Z ${lastZ}).`, i);
		}
		lastZ = layer.z;

		switch (layerConfig.action) {
			case 'switch': {
				const tool = layerConfig.tool ?? active.tool;
				if (tool === active.tool) {
					throw new JobSequenceError(`Layer ${i} changes to tool ${tool}, which is already active.`, i);
				}
				const next = getExtruder(tool, i);
				steps.push({ layer, ePos: layerConfig.extruderPosition, action: 'switch', extruder: active, next });
				active = next;
				break;
			}
			case 'infill':
				steps.push({ layer, ePos: layerConfig.extruderPosition, action: 'infill', extruder: active, next: active });
				break;
			case 'none':
				break;
		}
	}

	return emitTowerJob(tower, job, layers[0], initial, steps);
}

function* emitTowerJob(
	tower: SwitchTower,
	job: JobConfig,
	firstLayer: LayerInfo,
	initial: ExtruderProfile,
	steps: readonly TowerStep[],
): CommandLineGenerator {
	const { xySpeed, zSpeed, zHop } = job.travel;

	yield* tower.raftLines(firstLayer, initial, job.retractAfterRaft, xySpeed, zSpeed);

	for (const { layer, ePos, action, extruder, next } of steps) {
		const common = { layer, ePos, zHop, zSpeed, xySpeed };
		if (action === 'switch') {
			yield* tower.towerLines({ ...common, oldExtruder: extruder, newExtruder: next });
		} else {
			yield* tower.infillLines({ ...common, extruder });
		}
	}
}

/** Reads and validates a job file. */
export async function loadJobConfig(configFile: string): Promise<JobConfig> {
	const text = await readFile(path.resolve(configFile), 'utf8');
	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (e) {
		throw new JobConfigError(`${configFile} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
	}
	return parseJobConfig(data);
}

export interface GenerateOptions {
	overwrite?: boolean;
	logger: Logger;
}

export interface GenerateResult {
	inspection: TowerInspection;
	outputFile?: string;
}

/**
 * Generates the tower for the job in `configFile`. When `outputFile` is given, the serialized lines are
 * streamed to it; either way the generated lines are inspected and the summary returned.
 */
export async function generateTowerGCode(
	configFile: string,
	outputFile: string | undefined,
	options: GenerateOptions,
): Promise<GenerateResult> {
	const inputStat = await stat(path.resolve(configFile));
	if (!inputStat.isFile()) {
		throw new Error(`${configFile} is not a file`);
	}

	const job = await loadJobConfig(configFile);

	if (outputFile === undefined) {
		return { inspection: inspectTowerLines(runTowerJob(job, options.logger)) };
	}

	const outPath = path.resolve(path.dirname(outputFile));
	try {
		await access(outPath, constants.W_OK);
	} catch (e) {
		throw new Error(`${outPath} is not a writable directory`, { cause: e });
	}
	if (existsSync(path.resolve(outputFile)) && !options.overwrite) {
		throw new Error(`${outputFile} already exists`);
	}

	// Fails on a bad geometry or layer sequence before the output file is opened.
	const lines = runTowerJob(job, options.logger);
	const emitted: CommandLine[] = [];
	function* recorded(): CommandLineGenerator {
		for (const line of lines) {
			emitted.push(line);
			yield line;
		}
	}

	await pipeline(Readable.from(serializeCommandLines(recorded())), createWriteStream(path.resolve(outputFile)));
	options.logger.info({ outputFile, lines: emitted.length }, 'Wrote purge tower G-code');

	return { inspection: inspectTowerLines(emitted), outputFile };
}
