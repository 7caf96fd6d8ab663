import { Command } from 'commander';
import { generate } from '@/cli/commands/generate';

export const createProgram = () => {
	const program = new Command();
	program.name('purge-tower').description('Purge tower G-code generator for multi-material printing').version('1.0.0');
	generate(program);
	return program;
};

export const program = createProgram();
