import { stdSerializers, stdTimeFunctions, type LoggerOptions } from 'pino';

export const globalPinoOpts: LoggerOptions = {
	timestamp: stdTimeFunctions.isoTime,
	serializers: {
		err: stdSerializers.err,
	},
};
