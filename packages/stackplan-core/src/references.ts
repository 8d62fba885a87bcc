import { parseSub } from './sub';
import { TemplateValue, intrinsicName, isTemplateObject } from './template';

/**
 * Names that a template fragment refers to, each in first-seen order.
 */
export interface References {
    /**
     * Targets of `Ref` and of attribute-less `${Name}` placeholders in `Fn::Sub`. These may be resources,
     * parameters or pseudo parameters.
     */
    refs: string[];

    /**
     * Targets of `Fn::GetAtt` and of `${Name.Attribute}` placeholders. These must be resources.
     */
    getAtts: string[];

    /**
     * Conditions named by `Fn::If` or by `{ "Condition": name }` inside condition expressions.
     */
    conditions: string[];
}

/**
 * Walks a template fragment and collects every name it refers to.
 */
export function collectReferences(value: TemplateValue): References {
    const collector = new ReferenceCollector();
    collector.visit(value);
    return collector.result();
}

class ReferenceCollector {
    private readonly refs = new Set<string>();
    private readonly getAtts = new Set<string>();
    private readonly conditions = new Set<string>();

    result(): References {
        return {
            refs: [...this.refs],
            getAtts: [...this.getAtts],
            conditions: [...this.conditions],
        };
    }

    visit(value: TemplateValue): void {
        if (Array.isArray(value)) {
            value.forEach((item) => this.visit(item));
            return;
        }

        if (!isTemplateObject(value)) {
            return;
        }

        const keys = Object.keys(value);
        if (keys.length === 1 && keys[0] === 'Condition' && typeof value.Condition === 'string') {
            this.conditions.add(value.Condition);
            return;
        }

        const fn = intrinsicName(value);
        if (fn !== undefined) {
            this.visitIntrinsic(fn, value[fn]);
            return;
        }

        for (const v of Object.values(value)) {
            this.visit(v);
        }
    }

    private visitIntrinsic(fn: string, params: TemplateValue): void {
        switch (fn) {
            case 'Ref':
                if (typeof params === 'string') {
                    this.refs.add(params);
                }
                break;
            case 'Fn::GetAtt':
                if (typeof params === 'string') {
                    const dot = params.indexOf('.');
                    this.getAtts.add(dot === -1 ? params : params.slice(0, dot));
                } else if (Array.isArray(params) && typeof params[0] === 'string') {
                    this.getAtts.add(params[0]);
                    params.slice(1).forEach((p) => this.visit(p));
                }
                break;
            case 'Fn::Sub':
                this.visitSub(params);
                break;
            case 'Fn::If':
                if (Array.isArray(params) && typeof params[0] === 'string') {
                    this.conditions.add(params[0]);
                    params.slice(1).forEach((p) => this.visit(p));
                }
                break;
            default:
                this.visit(params);
                break;
        }
    }

    private visitSub(params: TemplateValue): void {
        let template: string;
        const locals = new Set<string>();
        if (typeof params === 'string') {
            template = params;
        } else if (Array.isArray(params) && typeof params[0] === 'string') {
            template = params[0];
            const vars = params[1];
            if (isTemplateObject(vars)) {
                for (const [name, v] of Object.entries(vars)) {
                    locals.add(name);
                    this.visit(v);
                }
            }
        } else {
            this.visit(params);
            return;
        }

        for (const part of parseSub(template)) {
            if (part.ref === undefined || locals.has(part.ref.id)) {
                continue;
            }
            if (part.ref.attr !== undefined) {
                this.getAtts.add(part.ref.id);
            } else {
                this.refs.add(part.ref.id);
            }
        }
    }
}
