import { z } from 'zod';

export const serverSchema = z.object({
	NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
	LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
	LOG_FILE: z.string().default('./purge-tower.log'),
});

export type ServerEnvironment = z.infer<typeof serverSchema>;
