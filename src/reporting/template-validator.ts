/**
 * Template Validator
 *
 * Checks that a templated manifest is still YAML once its directives are
 * rendered away: whole-line directives are dropped, inline expressions are
 * replaced by a plain scalar, and the result is parsed with js-yaml.
 */

import * as yaml from 'js-yaml';

export interface TemplateValidation {
    isValid: boolean;
    errors: string[];
}

const LINE_DIRECTIVE = /^[ \t]*\{\{-?[^}]*\}\}[ \t]*$/;
const INLINE_EXPRESSION = /\{\{-?[^}]*\}\}/g;

export const EXPRESSION_PLACEHOLDER = 'templated';

export function stripDirectives(content: string): string {
    return content
        .split('\n')
        .filter((line) => !LINE_DIRECTIVE.test(line))
        .map((line) => line.replace(INLINE_EXPRESSION, EXPRESSION_PLACEHOLDER))
        .join('\n');
}

export function validateTemplate(content: string): TemplateValidation {
    const errors: string[] = [];

    try {
        yaml.loadAll(stripDirectives(content));
    } catch (error) {
        errors.push(error instanceof Error ? error.message : 'Unknown parsing error');
    }

    return { isValid: errors.length === 0, errors };
}
