import { pino, type Logger, type LoggerOptions } from 'pino';
import { serverSchema } from '@/env/schema';
import { globalPinoOpts } from '@/helpers/logger';
import pretty from 'pino-pretty';

let logger: Logger | null = null;

export const getLogger = (): Logger => {
	if (logger != null) {
		return logger;
	}
	const environment = serverSchema.parse(process.env);

	const transportOption: LoggerOptions['transport'] =
		environment.NODE_ENV === 'development' || environment.NODE_ENV === 'test'
			? undefined
			: {
					target: 'pino/file',
					options: { destination: environment.LOG_FILE, append: true, mkdir: true },
				};

	if (transportOption == null) {
		const prettyStream = pretty({
			levelFirst: true,
			colorize: true,
			ignore: 'hostname,pid',
			destination: 2,
		});
		logger = pino({ ...globalPinoOpts, level: environment.LOG_LEVEL }, prettyStream).child({ source: 'cli' });
	} else {
		logger = pino({ ...globalPinoOpts, level: environment.LOG_LEVEL, transport: transportOption }).child({
			source: 'cli',
		});
	}
	return logger;
};
