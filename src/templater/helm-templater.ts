/**
 * Helm Templater
 *
 * Turns one rendered manifest into a Helm chart template by running a fixed,
 * ordered battery of text passes. Each pass takes the whole document and
 * returns it; later passes rely on the shapes earlier ones leave behind, so
 * the order below is part of the behaviour:
 *
 * 1. Conditional wrap - whole-document feature guards, decided by kind/name
 * 2. Metadata - namespace, certificate DNS names, ServiceMonitor name, labels
 * 3. Deployment fields - image, env, security contexts, resources, args
 * 4. Certificate guards - cert path args, webhook/metrics volumes and mounts
 * 5. Cleanup - blank lines left next to guards
 */

import { applyConditionalWrap, resolveWrapRule } from './conditional-wrap.js';
import {
    substituteCertificateDNSNames,
    substituteManagedByLabel,
    substituteNamespace,
    templateServiceMonitorNames
} from '../passes/metadata.js';
import {
    templateContainerSecurityContext,
    templateEnvironmentVariables,
    templateImageReference,
    templatePodSecurityContext,
    templateResources
} from '../passes/container.js';
import { makeContainerArgsConditional, templateControllerManagerArgs } from '../passes/args.js';
import {
    makeMetricsVolumeMountsConditional,
    makeMetricsVolumesConditional,
    makeWebhookVolumeMountsConditional,
    makeWebhookVolumesConditional
} from '../passes/volumes.js';
import { collapseBlankLineAfterIf } from '../passes/cleanup.js';
import { validateTemplate } from '../reporting/template-validator.js';
import { KINDS } from '../knowledge/resource-kinds.js';
import type {
    PassBreakdown,
    PassContext,
    ResourceDescriptor,
    TemplatePass,
    TemplateResult,
    TemplaterOptions
} from './types.js';

// ==========================================
// CONSTANTS
// ==========================================

const DEFAULT_OPTIONS: Omit<TemplaterOptions, 'projectName'> = {
    verbose: false
};

const isKind = (kind: string) => (resource: ResourceDescriptor): boolean => resource.kind === kind;
const isDeployment = isKind(KINDS.DEPLOYMENT);

export const TEMPLATE_PASSES: readonly TemplatePass[] = [
    { name: 'Conditional Wrap', run: (content, ctx) => applyConditionalWrap(content, ctx.resource) },
    { name: 'Namespace', run: substituteNamespace },
    { name: 'Certificate DNS Names', appliesTo: isKind(KINDS.CERTIFICATE), run: substituteCertificateDNSNames },
    { name: 'ServiceMonitor Name', appliesTo: isKind(KINDS.SERVICE_MONITOR), run: templateServiceMonitorNames },
    { name: 'Managed-By Label', run: substituteManagedByLabel },
    { name: 'Image Reference', appliesTo: isDeployment, run: templateImageReference },
    { name: 'Environment Variables', appliesTo: isDeployment, run: templateEnvironmentVariables },
    { name: 'Pod Security Context', appliesTo: isDeployment, run: templatePodSecurityContext },
    { name: 'Container Security Context', appliesTo: isDeployment, run: templateContainerSecurityContext },
    { name: 'Resources', appliesTo: isDeployment, run: templateResources },
    { name: 'Controller Manager Args', appliesTo: isDeployment, run: templateControllerManagerArgs },
    { name: 'Cert Path Args', appliesTo: isDeployment, run: makeContainerArgsConditional },
    { name: 'Webhook Volume Mounts', appliesTo: isDeployment, run: makeWebhookVolumeMountsConditional },
    { name: 'Webhook Volumes', appliesTo: isDeployment, run: makeWebhookVolumesConditional },
    { name: 'Metrics Volume Mounts', appliesTo: isDeployment, run: makeMetricsVolumeMountsConditional },
    { name: 'Metrics Volumes', appliesTo: isDeployment, run: makeMetricsVolumesConditional },
    { name: 'Blank Line Cleanup', run: collapseBlankLineAfterIf }
];

// ==========================================
// HELM TEMPLATER CLASS
// ==========================================

export class HelmTemplater {
    private options: TemplaterOptions;

    constructor(options: Pick<TemplaterOptions, 'projectName'> & Partial<TemplaterOptions>) {
        if (options.projectName.trim() === '') {
            throw new Error('HelmTemplater requires a non-empty projectName');
        }
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    get projectName(): string {
        return this.options.projectName;
    }

    /**
     * Templates one manifest. Returns an empty string for resources that are
     * dropped from the chart altogether.
     */
    apply(content: string, resource: ResourceDescriptor): string {
        return this.runPasses(content, resource, null);
    }

    /**
     * Same output as `apply`, plus which passes changed the document and
     * whether the result still parses once directives are rendered.
     */
    applyWithReport(content: string, resource: ResourceDescriptor): TemplateResult {
        const passBreakdown: PassBreakdown[] = [];
        const templated = this.runPasses(content, resource, passBreakdown);
        const validation = validateTemplate(templated);

        if (this.options.verbose) {
            this.logBreakdown(resource, passBreakdown, validation.errors);
        }

        return {
            content: templated,
            wrapRule: resolveWrapRule(resource).name,
            isValid: validation.isValid,
            errors: validation.errors,
            passBreakdown
        };
    }

    private runPasses(content: string, resource: ResourceDescriptor, breakdown: PassBreakdown[] | null): string {
        const context: PassContext = { resource, projectName: this.options.projectName };
        let current = content;

        TEMPLATE_PASSES.forEach((pass, index) => {
            if (pass.appliesTo && !pass.appliesTo(resource)) return;

            const start = Date.now();
            const next = pass.run(current, context);
            breakdown?.push({
                pass: index + 1,
                name: pass.name,
                changed: next !== current,
                duration: Date.now() - start
            });
            current = next;
        });

        return current;
    }

    private logBreakdown(resource: ResourceDescriptor, breakdown: PassBreakdown[], errors: string[]): void {
        console.log(`=== HELM TEMPLATE BREAKDOWN: ${resource.kind}/${resource.name} ===`);
        for (const entry of breakdown) {
            if (entry.changed) {
                console.log(`Pass ${entry.pass} (${entry.name}) changed the document in ${entry.duration}ms`);
            }
        }
        for (const error of errors) {
            console.log('Rendered template does not parse:', error);
        }
    }
}

// ==========================================
// EXPORTS
// ==========================================

/**
 * Convenience function to template a single manifest
 */
export function templateManifest(
    content: string,
    resource: ResourceDescriptor,
    options: Pick<TemplaterOptions, 'projectName'> & Partial<TemplaterOptions>
): string {
    return new HelmTemplater(options).apply(content, resource);
}
