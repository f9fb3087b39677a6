/**
 * Helm Manifest Templater
 * Main entry point
 */

export { HelmTemplater, TEMPLATE_PASSES, templateManifest } from './templater/helm-templater.js';
export { WRAP_RULES, applyConditionalWrap, resolveWrapRule } from './templater/conditional-wrap.js';
export { CONDITIONS, PLACEHOLDERS, VALUES_PATHS } from './templater/directives.js';
export { locateBlock, findContainer, toLineRecord } from './parser/line-model.js';
export { collapseBlankLineAfterIf } from './passes/cleanup.js';
export { stripDirectives, validateTemplate } from './reporting/template-validator.js';
export {
    describeManifest,
    descriptorFromObject,
    splitDocuments,
    templateManifests
} from './manifest/manifest-splitter.js';

export type { WrapRule } from './templater/conditional-wrap.js';
export type { GuardCondition } from './templater/directives.js';
export type { BlockMode, IndentBlock, LineRecord, ContainerRange } from './parser/line-model.js';
export type { TemplateValidation } from './reporting/template-validator.js';
export type {
    PassBreakdown,
    PassContext,
    ResourceDescriptor,
    TemplatePass,
    TemplateResult,
    TemplaterOptions
} from './templater/types.js';
