import * as fs from 'fs-extra';
import {
    ParameterError,
    ParseError,
    TemplateModel,
    errorMessage,
    isTemplateObject,
    loadTemplateDocument,
    parseTemplate,
} from '@stackplan/core';

/**
 * Reads and validates a template file. JSON is a subset of YAML, so one loader handles both.
 *
 * @throws ParseError if the file cannot be read or is not a valid template
 */
export async function loadTemplateFile(templatePath: string): Promise<TemplateModel> {
    let text: string;
    try {
        text = await fs.readFile(templatePath, 'utf8');
    } catch (e) {
        throw new ParseError(`Unable to read template: ${errorMessage(e)}`, templatePath, { cause: e });
    }
    return parseTemplate(loadTemplateDocument(text, templatePath));
}

/**
 * Reads a parameter file: a JSON or YAML mapping from parameter names to values. Lists become comma-delimited
 * strings.
 */
export async function loadParameterFile(parameterPath: string): Promise<{ [name: string]: string }> {
    let text: string;
    try {
        text = await fs.readFile(parameterPath, 'utf8');
    } catch (e) {
        throw new ParseError(`Unable to read parameter file: ${errorMessage(e)}`, parameterPath, { cause: e });
    }
    return parameterValues(loadTemplateDocument(text, parameterPath), parameterPath);
}

export function parameterValues(document: unknown, source: string): { [name: string]: string } {
    if (!isTemplateObject(document)) {
        throw new ParseError('expected a mapping of parameter names to values', source);
    }
    const result: { [name: string]: string } = {};
    for (const [name, value] of Object.entries(document)) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            result[name] = String(value);
        } else if (Array.isArray(value) && value.every((item) => typeof item === 'string' || typeof item === 'number')) {
            result[name] = value.join(',');
        } else {
            throw new ParameterError(name, `unsupported value in ${source}`);
        }
    }
    return result;
}
