import { describe, it, expect } from 'vitest';
import { makeContainerArgsConditional, templateControllerManagerArgs } from '../src/passes/args.js';

describe('templateControllerManagerArgs', () => {
    const input = [
        '      containers:',
        '      - args:',
        '        - --metrics-bind-address=:8443',
        '        - --leader-elect',
        '        - --health-probe-bind-address=:8081',
        '        - --webhook-cert-path=/tmp/k8s-webhook-server/serving-certs',
        '        command:',
        '        - /manager',
        '        image: ctrl:v1',
        '        name: manager'
    ].join('\n');

    it('should restructure the manager args around the values loop', () => {
        expect(templateControllerManagerArgs(input)).toBe([
            '      containers:',
            '      - args:',
            '        {{- if .Values.metrics.enable }}',
            '        - --metrics-bind-address=:8443',
            '        {{- else }}',
            '        # Bind to :0 to disable the controller-runtime managed metrics server',
            '        - --metrics-bind-address=0',
            '        {{- end }}',
            '        - --health-probe-bind-address=:8081',
            '        {{- range .Values.controllerManager.args }}',
            '        - {{ . }}',
            '        {{- end }}',
            '        - --webhook-cert-path=/tmp/k8s-webhook-server/serving-certs',
            '        command:',
            '        - /manager',
            '        image: ctrl:v1',
            '        name: manager'
        ].join('\n'));
    });

    it('should be idempotent', () => {
        const once = templateControllerManagerArgs(input);
        expect(templateControllerManagerArgs(once)).toBe(once);
    });

    it('should recognise its own output when the list now starts with a kept flag', () => {
        const plain = [
            '      - args:',
            '        - --leader-elect',
            '        - --health-probe-bind-address=:8081',
            '        name: manager'
        ].join('\n');

        const once = templateControllerManagerArgs(plain);
        expect(once).toBe([
            '      - args:',
            '        - --health-probe-bind-address=:8081',
            '        {{- range .Values.controllerManager.args }}',
            '        - {{ . }}',
            '        {{- end }}',
            '        name: manager'
        ].join('\n'));
        expect(templateControllerManagerArgs(once)).toBe(once);
    });

    it('should leave the args of other containers alone', () => {
        const proxy = [
            '      - args:',
            '        - --secure-listen-address=0.0.0.0:8443',
            '        name: kube-rbac-proxy'
        ].join('\n');
        expect(templateControllerManagerArgs(proxy)).toBe(proxy);
    });
});

describe('makeContainerArgsConditional', () => {
    const input = [
        '        - --webhook-cert-path=/tmp/k8s-webhook-server/serving-certs',
        '        - --metrics-cert-path=/tmp/k8s-metrics-server/metrics-certs'
    ].join('\n');

    it('should guard each cert path flag on the features providing the certs', () => {
        expect(makeContainerArgsConditional(input)).toBe([
            '        {{- if .Values.certManager.enable }}',
            '        - --webhook-cert-path=/tmp/k8s-webhook-server/serving-certs',
            '        {{- end }}',
            '        {{- if and .Values.certManager.enable .Values.metrics.enable }}',
            '        - --metrics-cert-path=/tmp/k8s-metrics-server/metrics-certs',
            '        {{- end }}'
        ].join('\n'));
    });

    it('should not guard a flag twice', () => {
        const once = makeContainerArgsConditional(input);
        expect(makeContainerArgsConditional(once)).toBe(once);
    });

    it('should leave other args alone', () => {
        const other = '        - --leader-elect\n';
        expect(makeContainerArgsConditional(other)).toBe(other);
    });
});
