import { type Logger } from 'pino';


export interface InferenceContext {
	logger: Logger;
	signal?: AbortSignal;
	cost?: (deltaCost: number) => void;
}
