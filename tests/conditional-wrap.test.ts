/**
 * Conditional wrapping decision table
 */

import { describe, it, expect } from 'vitest';
import { applyConditionalWrap, resolveWrapRule } from '../src/templater/conditional-wrap.js';
import type { ResourceDescriptor } from '../src/templater/types.js';

// ==========================================
// TEST UTILITIES
// ==========================================

function resource(kind: string, name: string, apiVersion = 'v1'): ResourceDescriptor {
    return { kind, apiVersion, name, namespace: '' };
}

const BODY = 'apiVersion: v1\nkind: Example\nmetadata:\n  name: example\n';

// ==========================================
// DECISION TABLE
// ==========================================

describe('Conditional Wrap', () => {
    it('should elide Namespace resources entirely', () => {
        expect(applyConditionalWrap(BODY, resource('Namespace', 'myproj-system'))).toBe('');
    });

    it('should wrap CRDs in crd.enable with a trailing newline', () => {
        const result = applyConditionalWrap(BODY, resource('CustomResourceDefinition', 'widgets.example.com'));
        expect(result).toBe(`{{- if .Values.crd.enable }}\n${BODY}{{- end }}\n`);
    });

    it('should require cert-manager and metrics for metrics certificates', () => {
        const result = applyConditionalWrap(BODY, resource('Certificate', 'myproj-metrics-certs', 'cert-manager.io/v1'));
        expect(result).toBe(`{{- if and .Values.certManager.enable .Values.metrics.enable }}\n${BODY}{{- end }}\n`);
    });

    it('should require only cert-manager for other certificates', () => {
        const result = applyConditionalWrap(BODY, resource('Certificate', 'myproj-serving-cert', 'cert-manager.io/v1'));
        expect(result).toBe(`{{- if .Values.certManager.enable }}\n${BODY}{{- end }}`);
    });

    it('should leave certificates of other API groups alone', () => {
        expect(applyConditionalWrap(BODY, resource('Certificate', 'myproj-serving-cert', 'example.io/v1'))).toBe(BODY);
    });

    it('should wrap cert-manager issuers in certManager.enable', () => {
        const result = applyConditionalWrap(BODY, resource('Issuer', 'myproj-selfsigned-issuer', 'cert-manager.io/v1'));
        expect(result).toBe(`{{- if .Values.certManager.enable }}\n${BODY}{{- end }}`);
    });

    it('should wrap ServiceMonitors in prometheus.enable', () => {
        const result = applyConditionalWrap(
            BODY,
            resource('ServiceMonitor', 'myproj-controller-manager-metrics-monitor', 'monitoring.coreos.com/v1')
        );
        expect(result).toBe(`{{- if .Values.prometheus.enable }}\n${BODY}{{- end }}`);
    });

    it('should wrap helper roles in rbacHelpers.enable', () => {
        for (const name of ['myproj-widget-admin-role', 'myproj-widget-editor-role', 'myproj-widget-viewer-role']) {
            expect(applyConditionalWrap(BODY, resource('ClusterRole', name)))
                .toBe(`{{- if .Values.rbacHelpers.enable }}\n${BODY}{{- end }}\n`);
        }
    });

    it('should prefer the helper rule over the metrics rule', () => {
        expect(resolveWrapRule(resource('ClusterRole', 'myproj-metrics-viewer-role')).name).toBe('rbac-helper');
    });

    it('should wrap metrics RBAC in metrics.enable', () => {
        const result = applyConditionalWrap(BODY, resource('ClusterRoleBinding', 'myproj-metrics-auth-rolebinding'));
        expect(result).toBe(`{{- if .Values.metrics.enable }}\n${BODY}{{- end }}\n`);
    });

    it('should always emit essential RBAC', () => {
        for (const kind of ['ServiceAccount', 'Role', 'ClusterRole', 'RoleBinding', 'ClusterRoleBinding']) {
            expect(applyConditionalWrap(BODY, resource(kind, 'myproj-manager-role'))).toBe(BODY);
        }
    });

    it('should wrap metrics services in metrics.enable', () => {
        const result = applyConditionalWrap(BODY, resource('Service', 'myproj-controller-manager-metrics-service'));
        expect(result).toBe(`{{- if .Values.metrics.enable }}\n${BODY}{{- end }}\n`);
    });

    it('should always emit other services', () => {
        expect(applyConditionalWrap(BODY, resource('Service', 'myproj-webhook-service'))).toBe(BODY);
        expect(resolveWrapRule(resource('Service', 'myproj-webhook-service')).name).toBe('service');
    });

    it('should guard only the CA injection annotation of webhook configurations', () => {
        const input = [
            'apiVersion: admissionregistration.k8s.io/v1',
            'kind: MutatingWebhookConfiguration',
            'metadata:',
            '  annotations:',
            '    cert-manager.io/inject-ca-from: myproj-system/myproj-serving-cert',
            '  name: myproj-mutating-webhook-configuration',
            ''
        ].join('\n');

        expect(applyConditionalWrap(input, resource('MutatingWebhookConfiguration', 'myproj-mutating-webhook-configuration')))
            .toBe([
                'apiVersion: admissionregistration.k8s.io/v1',
                'kind: MutatingWebhookConfiguration',
                'metadata:',
                '  annotations:',
                '    {{- if .Values.certManager.enable }}',
                '    cert-manager.io/inject-ca-from: myproj-system/myproj-serving-cert',
                '    {{- end }}',
                '  name: myproj-mutating-webhook-configuration',
                ''
            ].join('\n'));
    });

    it('should fall back to the default rule for other kinds', () => {
        expect(resolveWrapRule(resource('Deployment', 'myproj-controller-manager')).name).toBe('default');
        expect(applyConditionalWrap(BODY, resource('Deployment', 'myproj-controller-manager'))).toBe(BODY);
    });

    it('should not wrap a document twice', () => {
        const crd = resource('CustomResourceDefinition', 'widgets.example.com');
        const once = applyConditionalWrap(BODY, crd);
        expect(applyConditionalWrap(once, crd)).toBe(once);

        const webhook = resource('ValidatingWebhookConfiguration', 'myproj-validating-webhook-configuration');
        const annotated = 'metadata:\n  annotations:\n    cert-manager.io/inject-ca-from: ns/cert\n';
        const guarded = applyConditionalWrap(annotated, webhook);
        expect(applyConditionalWrap(guarded, webhook)).toBe(guarded);
    });
});
