import { Command } from 'commander';
import dotenv from 'dotenv';
import { existsSync } from 'node:fs';
import { realpath } from 'node:fs/promises';
import path from 'node:path';

/** Loads `.env.local`, or failing that `.env`, into `process.env` without overriding what is already set. */
export const loadEnvironment = () => {
	const envFile = existsSync('./.env.local') ? '.env.local' : '.env';
	if (existsSync(envFile)) {
		dotenv.config({ path: envFile });
	}
};

/**
 * Resolves a user-supplied path. For paths that do not exist yet, such as an output file, the parent
 * directory is resolved instead.
 */
export const getRealPath = async (program: Command, p: string): Promise<string> => {
	const resolved = path.resolve(p);
	try {
		return await realpath(resolved);
	} catch (e) {
		if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
			try {
				return path.join(await realpath(path.dirname(resolved)), path.basename(resolved));
			} catch {
				program.error(`Directory ${path.dirname(resolved)} does not exist`, { exitCode: 1 });
			}
		}
		throw e;
	}
};
