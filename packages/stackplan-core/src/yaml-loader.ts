import { Document, isAlias, isMap, isScalar, isSeq, parseDocument } from 'yaml';
import { ParseError } from './errors';
import { TemplateObject, TemplateValue } from './template';

/**
 * Short-form intrinsic tags and the long-form keys they expand to.
 *
 * See https://docs.aws.amazon.com/AWSCloudFormation/latest/UserGuide/intrinsic-function-reference.html
 */
const SHORT_FORM_TAGS: { [tag: string]: string } = {
    '!Ref': 'Ref',
    '!Condition': 'Condition',
    '!Base64': 'Fn::Base64',
    '!Cidr': 'Fn::Cidr',
    '!FindInMap': 'Fn::FindInMap',
    '!GetAtt': 'Fn::GetAtt',
    '!GetAZs': 'Fn::GetAZs',
    '!ImportValue': 'Fn::ImportValue',
    '!Join': 'Fn::Join',
    '!Select': 'Fn::Select',
    '!Split': 'Fn::Split',
    '!Sub': 'Fn::Sub',
    '!And': 'Fn::And',
    '!Equals': 'Fn::Equals',
    '!If': 'Fn::If',
    '!Not': 'Fn::Not',
    '!Or': 'Fn::Or',
};

/**
 * Parses YAML or JSON template text into a document tree with all short-form tags expanded.
 *
 * @param source - Name used in error messages, usually the file path
 */
export function loadTemplateDocument(text: string, source = '<template>'): TemplateValue {
    const doc = parseDocument(text, { uniqueKeys: true });
    if (doc.errors.length > 0) {
        const first = doc.errors[0];
        throw new ParseError(first.message, source, { cause: first });
    }
    return convertNode(doc.contents, doc, source);
}

function convertNode(node: unknown, doc: Document, source: string): TemplateValue {
    if (node === null || node === undefined) {
        return null;
    }

    if (isAlias(node)) {
        const target = node.resolve(doc);
        if (target === undefined) {
            throw new ParseError(`Unresolved alias *${node.source}`, source);
        }
        return convertNode(target, doc, source);
    }

    let value: TemplateValue;
    let tag: string | undefined;
    if (isScalar(node)) {
        value = convertScalar(node.value);
        tag = node.tag;
    } else if (isMap(node)) {
        const obj: TemplateObject = {};
        for (const pair of node.items) {
            const key = convertNode(pair.key, doc, source);
            if (typeof key !== 'string' && typeof key !== 'number' && typeof key !== 'boolean') {
                throw new ParseError('Mapping keys must be scalars', source);
            }
            obj[String(key)] = convertNode(pair.value, doc, source);
        }
        value = obj;
        tag = node.tag;
    } else if (isSeq(node)) {
        value = node.items.map((item) => convertNode(item, doc, source));
        tag = node.tag;
    } else {
        throw new ParseError(`Unsupported YAML node ${String(node)}`, source);
    }

    if (tag === undefined || !tag.startsWith('!')) {
        return value;
    }
    return expandShortForm(tag, value, source);
}

function convertScalar(value: unknown): TemplateValue {
    if (value === null || value === undefined) {
        return null;
    }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'bigint') {
        return Number(value);
    }
    return String(value);
}

function expandShortForm(tag: string, value: TemplateValue, source: string): TemplateValue {
    const name = SHORT_FORM_TAGS[tag];
    if (name === undefined) {
        throw new ParseError(`Unknown tag ${tag}`, source);
    }

    if (name === 'Fn::GetAtt' && typeof value === 'string') {
        const dot = value.indexOf('.');
        if (dot === -1) {
            throw new ParseError(`!GetAtt expects 'LogicalName.Attribute', got '${value}'`, source);
        }
        return { [name]: [value.slice(0, dot), value.slice(dot + 1)] };
    }

    // `!GetAZs` with an empty scalar means the current region.
    if (name === 'Fn::GetAZs' && value === null) {
        return { [name]: '' };
    }

    return { [name]: value };
}
