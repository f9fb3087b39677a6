/**
 * Helm Directives
 *
 * The literal guard lines, conditions and placeholders the passes write.
 * The passes only know directives as strings: they emit them and probe for
 * them, nothing here models a template tree.
 */

// ==========================================
// CONDITIONS
// ==========================================

export const CONDITIONS = {
    CRD: '.Values.crd.enable',
    CERT_MANAGER: '.Values.certManager.enable',
    METRICS: '.Values.metrics.enable',
    PROMETHEUS: '.Values.prometheus.enable',
    RBAC_HELPERS: '.Values.rbacHelpers.enable',
    CERT_MANAGER_AND_METRICS: 'and .Values.certManager.enable .Values.metrics.enable'
} as const;

export type GuardCondition = typeof CONDITIONS[keyof typeof CONDITIONS];

export const ELSE_GUARD = '{{- else }}';
export const CLOSE_GUARD = '{{- end }}';

/** Substring every opening guard line contains */
export const OPEN_GUARD_MARKER = '{{- if ';

export function openGuard(condition: GuardCondition): string {
    return `{{- if ${condition} }}`;
}

// ==========================================
// VALUES & PLACEHOLDERS
// ==========================================

export const CONTROLLER_MANAGER_VALUES = '.Values.controllerManager';

export const VALUES_PATHS = {
    IMAGE_REPOSITORY: `${CONTROLLER_MANAGER_VALUES}.image.repository`,
    IMAGE_TAG: `${CONTROLLER_MANAGER_VALUES}.image.tag`,
    IMAGE_PULL_POLICY: `${CONTROLLER_MANAGER_VALUES}.image.pullPolicy`,
    ARGS: `${CONTROLLER_MANAGER_VALUES}.args`
} as const;

export const PLACEHOLDERS = {
    RELEASE_NAMESPACE: '{{ .Release.Namespace }}',
    RELEASE_SERVICE: '{{ .Release.Service }}',
    CHART_NAME: '{{ include "chart.name" . }}',
    NAMESPACE_NAME: '{{ include "chart.namespaceName" . }}'
} as const;

export function serviceNameHelper(suffix: string): string {
    return `{{ include "chart.serviceName" (dict "suffix" "${suffix}" "context" .) }}`;
}

// ==========================================
// BUILDERS
// ==========================================

/**
 * Wraps a whole document. `content` is expected to end with a newline.
 */
export function wrapDocument(content: string, condition: GuardCondition, trailingNewline: boolean): string {
    return `${openGuard(condition)}\n${content}${CLOSE_GUARD}${trailingNewline ? '\n' : ''}`;
}

export function wrapLines(lines: readonly string[], indent: string, condition: GuardCondition): string[] {
    return [`${indent}${openGuard(condition)}`, ...lines, `${indent}${CLOSE_GUARD}`];
}

/**
 * Body of a key whose value comes from `.Values.controllerManager.<field>`,
 * falling back to `fallback` when the value is empty.
 */
export function valuesBlock(field: string, childIndent: string, fallback: '[]' | '{}'): string[] {
    const path = `${CONTROLLER_MANAGER_VALUES}.${field}`;
    return [
        `${childIndent}{{- if ${path} }}`,
        `${childIndent}{{- toYaml ${path} | nindent ${childIndent.length} }}`,
        `${childIndent}${ELSE_GUARD}`,
        `${childIndent}${fallback}`,
        `${childIndent}${CLOSE_GUARD}`
    ];
}
