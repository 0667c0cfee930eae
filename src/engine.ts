import { type InferenceContext } from './inference-context.ts';
import { type EndpointSpec } from './endpoint-spec.ts';
import { type Throttle } from './throttle.ts';


export interface Session {
	developerMessage?: string;
	userMessage: string;
}

/**
 * @returns the text of the AI message
 * @throws {@link UserAbortion} the caller aborted
 * @throws {@link InferenceTimeout} the endpoint timeout elapsed
 * @throws {@link ResponseInvalid} the reply carries no usable content
 */
export interface Engine {
	(ctx: InferenceContext, session: Session, model?: string): Promise<string>;
}

export namespace Engine {
	export interface Options extends EndpointSpec {
		throttle: Throttle;
	}
}

export class ResponseInvalid extends Error {}
export class UserAbortion extends Error {}
export class InferenceTimeout extends Error {}
