/**
 * Conditional Wrapping
 *
 * Decides from the resource descriptor alone whether the whole rendered
 * document is toggled by a feature flag. Optional integrations (CRDs,
 * cert-manager objects, monitoring, metrics, RBAC helpers) get a guard;
 * essential RBAC and services are always rendered.
 *
 * The policy is an ordered table: the first matching rule wins.
 */

import {
    API_VERSIONS,
    KINDS,
    METRICS_MARKER,
    RBAC_HELPER_MARKERS,
    RBAC_KINDS,
    WEBHOOK_KINDS
} from '../knowledge/resource-kinds.js';
import { CONDITIONS, openGuard, wrapDocument, type GuardCondition } from './directives.js';
import { makeWebhookAnnotationsConditional } from '../passes/volumes.js';
import type { ResourceDescriptor } from './types.js';

// ==========================================
// TYPES
// ==========================================

export interface WrapRule {
    name: string;
    matches: (resource: ResourceDescriptor) => boolean;
    apply: (content: string) => string;
}

// ==========================================
// STRATEGIES
// ==========================================

const unchanged = (content: string): string => content;

const elide = (): string => '';

function guardDocument(condition: GuardCondition, trailingNewline: boolean): (content: string) => string {
    const open = `${openGuard(condition)}\n`;
    return (content: string): string =>
        content.startsWith(open) ? content : wrapDocument(content, condition, trailingNewline);
}

const isCertManager = (resource: ResourceDescriptor): boolean =>
    resource.apiVersion === API_VERSIONS.CERT_MANAGER;

const hasMetricsName = (resource: ResourceDescriptor): boolean =>
    resource.name.includes(METRICS_MARKER);

const isRbacHelper = (resource: ResourceDescriptor): boolean =>
    RBAC_HELPER_MARKERS.some((marker) => resource.name.includes(marker));

// ==========================================
// DECISION TABLE
// ==========================================

export const WRAP_RULES: readonly WrapRule[] = [
    {
        name: 'namespace',
        matches: (r) => r.kind === KINDS.NAMESPACE,
        apply: elide
    },
    {
        name: 'crd',
        matches: (r) => r.kind === KINDS.CUSTOM_RESOURCE_DEFINITION,
        apply: guardDocument(CONDITIONS.CRD, true)
    },
    {
        name: 'metrics-certificate',
        matches: (r) => r.kind === KINDS.CERTIFICATE && isCertManager(r) && hasMetricsName(r),
        apply: guardDocument(CONDITIONS.CERT_MANAGER_AND_METRICS, true)
    },
    {
        name: 'certificate',
        matches: (r) => r.kind === KINDS.CERTIFICATE && isCertManager(r),
        apply: guardDocument(CONDITIONS.CERT_MANAGER, false)
    },
    {
        name: 'issuer',
        matches: (r) => r.kind === KINDS.ISSUER && isCertManager(r),
        apply: guardDocument(CONDITIONS.CERT_MANAGER, false)
    },
    {
        name: 'service-monitor',
        matches: (r) => r.kind === KINDS.SERVICE_MONITOR && r.apiVersion === API_VERSIONS.MONITORING,
        apply: guardDocument(CONDITIONS.PROMETHEUS, false)
    },
    {
        name: 'rbac-helper',
        matches: (r) => RBAC_KINDS.has(r.kind) && isRbacHelper(r),
        apply: guardDocument(CONDITIONS.RBAC_HELPERS, true)
    },
    {
        name: 'metrics-rbac',
        matches: (r) => RBAC_KINDS.has(r.kind) && hasMetricsName(r),
        apply: guardDocument(CONDITIONS.METRICS, true)
    },
    {
        name: 'essential-rbac',
        matches: (r) => RBAC_KINDS.has(r.kind),
        apply: unchanged
    },
    {
        name: 'webhook-configuration',
        matches: (r) => WEBHOOK_KINDS.has(r.kind),
        apply: makeWebhookAnnotationsConditional
    },
    {
        name: 'metrics-service',
        matches: (r) => r.kind === KINDS.SERVICE && hasMetricsName(r),
        apply: guardDocument(CONDITIONS.METRICS, true)
    },
    {
        name: 'service',
        matches: (r) => r.kind === KINDS.SERVICE,
        apply: unchanged
    }
];

const DEFAULT_RULE: WrapRule = {
    name: 'default',
    matches: () => true,
    apply: unchanged
};

export function resolveWrapRule(resource: ResourceDescriptor): WrapRule {
    return WRAP_RULES.find((rule) => rule.matches(resource)) ?? DEFAULT_RULE;
}

export function applyConditionalWrap(content: string, resource: ResourceDescriptor): string {
    return resolveWrapRule(resource).apply(content);
}
