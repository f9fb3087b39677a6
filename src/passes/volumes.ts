/**
 * Certificate Volume Passes
 *
 * The webhook and metrics certificate secrets only exist when cert-manager
 * (and, for metrics, the metrics endpoint) is enabled, so their volumes,
 * volume mounts and the CA injection annotation are guarded on those flags.
 */

import { CONDITIONS, openGuard, wrapLines, type GuardCondition } from '../templater/directives.js';
import { isGuardedBy } from '../templater/reentry.js';
import { splitLines } from '../parser/line-model.js';

// ==========================================
// TYPES
// ==========================================

export interface SpanGuard {
    name: string;
    /** Substrings that must all be present for the pass to run */
    triggers: string[];
    /** Matches from the anchoring list item through its terminating field; group 1 is the indent */
    pattern: RegExp;
    condition: GuardCondition;
}

// ==========================================
// CONSTANTS
// ==========================================

export const WEBHOOK_CERTS_PATH = '/tmp/k8s-webhook-server/serving-certs';
export const METRICS_CERTS_PATH = '/tmp/k8s-metrics-server/metrics-certs';
export const INJECT_CA_ANNOTATION = 'cert-manager.io/inject-ca-from';

export const SPAN_GUARDS = {
    webhookVolumeMounts: {
        name: 'Webhook Volume Mounts',
        triggers: ['webhook-certs', WEBHOOK_CERTS_PATH],
        pattern: /^([ \t]+)-[ \t]*mountPath:[ \t]*\/tmp\/k8s-webhook-server\/serving-certs[\s\S]*?readOnly:[ \t]*true/gm,
        condition: CONDITIONS.CERT_MANAGER
    },
    webhookVolumes: {
        name: 'Webhook Volumes',
        triggers: ['webhook-certs', 'secretName: webhook-server-cert'],
        pattern: /^([ \t]+)-[ \t]*name:[ \t]*webhook-certs[\s\S]*?secretName:[ \t]*webhook-server-cert/gm,
        condition: CONDITIONS.CERT_MANAGER
    },
    metricsVolumeMounts: {
        name: 'Metrics Volume Mounts',
        triggers: ['metrics-certs', METRICS_CERTS_PATH],
        pattern: /^([ \t]+)-[ \t]*mountPath:[ \t]*\/tmp\/k8s-metrics-server\/metrics-certs[\s\S]*?readOnly:[ \t]*true/gm,
        condition: CONDITIONS.CERT_MANAGER_AND_METRICS
    },
    metricsVolumes: {
        name: 'Metrics Volumes',
        triggers: ['metrics-certs', 'secretName: metrics-server-cert'],
        pattern: /^([ \t]+)-[ \t]*name:[ \t]*metrics-certs[\s\S]*?secretName:[ \t]*metrics-server-cert/gm,
        condition: CONDITIONS.CERT_MANAGER_AND_METRICS
    }
} satisfies Record<string, SpanGuard>;

// ==========================================
// SPAN WRAPPING
// ==========================================

function lineBefore(content: string, offset: number): string {
    if (offset === 0) return '';
    const end = offset - 1;
    const start = content.lastIndexOf('\n', end - 1) + 1;
    return content.slice(start, end);
}

/**
 * Wraps each span `guard.pattern` matches in the guard's if-block, at the
 * indentation of the span's first line.
 */
export function wrapSpans(content: string, guard: SpanGuard): string {
    if (!guard.triggers.every((trigger) => content.includes(trigger))) return content;

    const open = openGuard(guard.condition);
    return content.replace(guard.pattern, (match: string, indent: string, offset: number) => {
        if (lineBefore(content, offset).trim() === open) return match;
        return wrapLines([match], indent, guard.condition).join('\n');
    });
}

export function makeWebhookVolumeMountsConditional(content: string): string {
    return wrapSpans(content, SPAN_GUARDS.webhookVolumeMounts);
}

export function makeWebhookVolumesConditional(content: string): string {
    return wrapSpans(content, SPAN_GUARDS.webhookVolumes);
}

export function makeMetricsVolumeMountsConditional(content: string): string {
    return wrapSpans(content, SPAN_GUARDS.metricsVolumeMounts);
}

export function makeMetricsVolumesConditional(content: string): string {
    return wrapSpans(content, SPAN_GUARDS.metricsVolumes);
}

// ==========================================
// WEBHOOK ANNOTATION
// ==========================================

/**
 * Guards only the `cert-manager.io/inject-ca-from` annotation of a webhook
 * configuration; the configuration itself is always rendered.
 */
export function makeWebhookAnnotationsConditional(content: string): string {
    if (!content.includes(INJECT_CA_ANNOTATION)) return content;

    const lines = splitLines(content);
    const output: string[] = [];

    for (let i = 0; i < lines.length; i++) {
        const match = lines[i].match(/^([ \t]+)cert-manager\.io\/inject-ca-from:/);
        if (!match || isGuardedBy(lines, i, CONDITIONS.CERT_MANAGER)) {
            output.push(lines[i]);
            continue;
        }
        output.push(...wrapLines([`${match[1]}${lines[i].trim()}`], match[1], CONDITIONS.CERT_MANAGER));
    }

    return output.join('\n');
}
