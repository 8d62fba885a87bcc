import { ParseError } from './errors';
import { IntrinsicResolver } from './intrinsic-resolver';
import { debug } from './logging';
import { TemplateModel } from './model';
import { ParameterValue, PseudoParameterValues } from './parameters';

/**
 * Evaluates every condition of a template exactly once for a given set of parameter values.
 *
 * Conditions may refer to each other; evaluation follows those references and rejects circular definitions.
 */
export function evaluateConditions(
    model: TemplateModel,
    parameters: Map<string, ParameterValue>,
    pseudo: PseudoParameterValues,
): Map<string, boolean> {
    const results = new Map<string, boolean>();
    const inProgress = new Set<string>();

    const resolver = new IntrinsicResolver({
        model,
        parameters,
        pseudo,
        conditionValue: (name) => evaluate(name),
    });

    function evaluate(name: string): boolean {
        const cached = results.get(name);
        if (cached !== undefined) {
            return cached;
        }

        const expr = model.conditions.get(name);
        if (expr === undefined) {
            throw new ParseError(`Unable to find condition ${name}`, 'Conditions');
        }
        if (inProgress.has(name)) {
            throw new ParseError(`Circular condition reference through ${[...inProgress, name].join(' -> ')}`, 'Conditions');
        }

        inProgress.add(name);
        const result = resolver.evaluateCondition(expr, `Conditions.${name}`);
        inProgress.delete(name);

        debug(`condition ${name} is ${result}`);
        results.set(name, result);
        return result;
    }

    for (const name of model.conditions.keys()) {
        evaluate(name);
    }

    return results;
}
