export * from './function.ts';
export * from './reasoned-answer.ts';
export * from './engine.ts';
export * from './engines/openai-chatcompletions.ts';
export * from './inference-context.ts';
export * from './config.ts';
export * from './endpoint-spec.ts';
export * from './settings.ts';
export * from './throttle.ts';
export * from './logger.ts';
export { AnswerParser, extractAnswer } from './answer.ts';
export { nameArguments } from './arguments.ts';
export { dedent, format, formatTemplate, parseFields } from './template.ts';
export { collectModels, describeOutputFields, renderModels, renderType } from './schema.ts';
export { SYSTEM_PROMPT_TEMPLATE, generatePrompt, generateSystemPrompt, renderDeclaration, renderReport } from './prompt.ts';
