import { type TObject, type TSchema } from '@sinclair/typebox';
import { dedent, format, formatTemplate, toJSONText } from './template.ts';
import { describeOutputFields, renderModels, renderType } from './schema.ts';


export const SYSTEM_PROMPT_TEMPLATE = `
For the following TypeScript function, evaluate the user-provided input.

\`\`\`ts
{code}
\`\`\`

{thinking}
Provide the final output at the end as follows,
where FUNCTION_OUTPUT is in JSON format:

<ANSWER>
{{"result": FUNCTION_OUTPUT}}
</ANSWER>
`;

export const THINK_THROUGH = 'Think carefully through the answer. If the function documentation suggests steps, take these steps.';
export const ANSWER_DIRECTLY = 'Write the result directly without providing any explanation.';

export interface Declaration {
	name: string;
	/**
	 * Prompt template. `{name}` fields are replaced by the argument of that name.
	 */
	template: string;
	paraschema: TObject;
	returns: TSchema;
}

/**
 * The declaration as TypeScript source: the models it refers to, then the
 * function with its template as doc comment.
 */
export function renderDeclaration(declaration: Declaration): string {
	const models = renderModels(declaration.paraschema, declaration.returns);
	const doc = dedent(declaration.template).trim().replaceAll('*/', '*\\/').split('\n');
	const signature = `declare function ${declaration.name}(params: ${renderType(declaration.paraschema)}): ${renderType(declaration.returns)};`;
	return [
		...(models ? [models, ''] : []),
		'/**',
		...doc.map(line => line ? ` * ${line}` : ' *'),
		' */',
		signature,
	].join('\n');
}

export function generateSystemPrompt(declaration: Declaration, reasoning: boolean, systemPrompt?: string): string {
	const { text } = format(SYSTEM_PROMPT_TEMPLATE, {
		code: renderDeclaration(declaration),
		thinking: reasoning ? THINK_THROUGH : ANSWER_DIRECTLY,
	});
	return systemPrompt ? `${dedent(systemPrompt).trim()}\n${text}` : text;
}

/**
 * The user message: the template formatted with the arguments, then the
 * arguments it does not mention, then the fields of the output models.
 */
export function generatePrompt(declaration: Declaration, namedArgs: Readonly<Record<string, unknown>>): string {
	const { prompt: formatted, unused } = formatTemplate(declaration.template, namedArgs);
	let prompt = formatted;

	if (unused.length) {
		const leftovers = Object.fromEntries(unused.map(name => [name, namedArgs[name]]));
		prompt += `\nUse these values (provided in JSON):\n${toJSONText(leftovers, 2)}`;
	}

	const outputFields = describeOutputFields(declaration.returns);
	if (Object.keys(outputFields).length)
		prompt += `\n\nUse these output schema fields:\n${toJSONText(outputFields, 2)}`;

	return prompt;
}


export const REPORT_WIDTH = 80;

export function wrapLine(line: string, width = REPORT_WIDTH): string[] {
	if (line.length <= width) return [line];
	const indent = line.slice(0, line.length - line.trimStart().length);
	const room = Math.max(1, width - indent.length);
	const words = line.trim().split(/\s+/).flatMap(word => {
		const chunks: string[] = [];
		for (let i = 0; i < word.length; i += room) chunks.push(word.slice(i, i + room));
		return chunks;
	});
	const lines: string[] = [];
	let current = '';
	for (const word of words) {
		if (current && indent.length + current.length + 1 + word.length > width) {
			lines.push(indent + current);
			current = word;
		} else current = current ? `${current} ${word}` : word;
	}
	if (current) lines.push(indent + current);
	return lines;
}

/**
 * A readable record of one exchange with the model.
 */
export function renderReport(systemPrompt: string, userInput: string, response: string): string {
	const report = [
		'SYSTEM:',
		'-------',
		systemPrompt,
		'',
		'INPUT:',
		'------',
		'',
		userInput,
		'',
		'RESPONSE:',
		'---------',
		'',
		response,
	].join('\n');
	return report.split('\n').flatMap(line => wrapLine(line)).join('\n');
}
