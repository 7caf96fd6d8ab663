import { Command } from 'commander';
import { echo } from 'zx';
import { z, ZodError } from 'zod';
import { getLogger } from '@/cli/logger';
import { getRealPath, loadEnvironment } from '@/cli/util';
import { generateTowerGCode } from '@/server/switch-tower/switch-tower';
import { TowerInspectionSchema } from '@/server/switch-tower/TowerInspection';
import { JobConfigError, JobSequenceError, SwitchTowerError } from '@/server/switch-tower/errors';

export const GenerateCLIOutput = z.discriminatedUnion('result', [
	z.object({
		result: z.literal('error'),
		title: z.string().optional(),
		message: z.string(),
	}),
	z.object({
		result: z.literal('success'),
		outputFile: z.string().optional(),
		payload: TowerInspectionSchema,
	}),
]);

export type GenerateCLIOutput = z.infer<typeof GenerateCLIOutput>;

export const toGenerateCLIOutput = (obj: GenerateCLIOutput): void => {
	try {
		echo(JSON.stringify(GenerateCLIOutput.parse(obj)));
	} catch (e) {
		getLogger().error(e, 'An error occurred while serializing generator output');
		if (e instanceof ZodError) {
			echo(
				JSON.stringify({
					result: 'error',
					title: 'An error occurred while serializing generator output',
					message: e.message,
				} satisfies GenerateCLIOutput),
			);
		} else {
			throw e;
		}
	}
};

interface GenerateArgs {
	overwrite?: boolean;
}

export const generate = (program: Command) => {
	program
		.command('generate')
		.description('Generate purge tower G-code for a tower job file')
		.option('-o, --overwrite', 'Overwrite the output file if it exists')
		.argument('<config>', 'Path to the tower job file (JSON)')
		.argument('[output]', 'Path to the output gcode file (omit for inspection only)')
		.action(async (configFile: string, outputFile: string | undefined, args: GenerateArgs) => {
			loadEnvironment();

			configFile = await getRealPath(program, configFile);
			if (outputFile) {
				outputFile = await getRealPath(program, outputFile);
			}

			getLogger().info({ configFile, outputFile: outputFile ?? 'No output file specified', ...args }, 'generate options');

			try {
				const result = await generateTowerGCode(configFile, outputFile, {
					overwrite: args.overwrite,
					logger: getLogger(),
				});
				getLogger().info(result.inspection, 'generate result');
				toGenerateCLIOutput({ result: 'success', outputFile: result.outputFile, payload: result.inspection });
			} catch (e) {
				let errorTitle = 'An unexpected error occurred while generating the tower';
				let errorMessage = 'Please report this issue.';
				if (e instanceof SwitchTowerError) {
					errorTitle = 'The tower could not be generated';
					errorMessage = e.message;
					if (e instanceof JobConfigError) {
						errorTitle = 'Invalid job file';
					} else if (e instanceof JobSequenceError) {
						errorTitle = `Invalid layer sequence (layer ${e.layerIndex})`;
					}
				} else if (e instanceof Error) {
					if ('code' in e && e.code === 'ENOENT' && 'path' in e) {
						errorTitle = 'File not found';
						errorMessage = `File ${e.path} not found`;
					} else {
						errorMessage = e.message;
						getLogger().error(e, 'Unexpected error while generating the tower');
					}
				} else {
					getLogger().error(e, 'Unexpected error while generating the tower');
				}
				toGenerateCLIOutput({ result: 'error', title: errorTitle, message: errorMessage });
				program.error(`${errorTitle}: ${errorMessage}`, { exitCode: 1 });
			}
		});
};
