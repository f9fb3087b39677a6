/**
 * Metadata Passes
 *
 * Literal substitutions on names, namespaces and labels that kustomize
 * hardcodes from the project name.
 */

import { KINDS, NAME_SUFFIXES, METRICS_MARKER } from '../knowledge/resource-kinds.js';
import { PLACEHOLDERS, serviceNameHelper } from '../templater/directives.js';
import { escapeRegExp } from '../parser/line-model.js';
import type { PassContext } from '../templater/types.js';

const SERVICE_DNS_PLACEHOLDER = 'SERVICE_NAME.SERVICE_NAMESPACE.svc';
const CLUSTER_DOMAIN = '.cluster.local';
const METRICS_SERVICE_SUFFIX = NAME_SUFFIXES.METRICS_SERVICE.slice(1);

const MANAGED_BY_KUSTOMIZE = /^([ \t]*)app\.kubernetes\.io\/managed-by:[ \t]+kustomize[ \t]*$/gm;

/**
 * `<project>-system` becomes the release namespace everywhere, the Namespace
 * resource's own name and service DNS references included.
 */
export function substituteNamespace(content: string, context: PassContext): string {
    const hardcoded = `${context.projectName}${NAME_SUFFIXES.NAMESPACE}`;
    return content.replaceAll(hardcoded, PLACEHOLDERS.RELEASE_NAMESPACE);
}

/**
 * Points metrics certificates at the chart's metrics service and templates
 * the self-signed issuer reference of every certificate.
 */
export function substituteCertificateDNSNames(content: string, context: PassContext): string {
    if (context.resource.kind !== KINDS.CERTIFICATE) return content;

    let result = content;

    if (context.resource.name.includes(METRICS_MARKER)) {
        const service = serviceNameHelper(METRICS_SERVICE_SUFFIX);
        const fqdn = `${service}.${PLACEHOLDERS.NAMESPACE_NAME}.svc`;

        // The cluster-local form has to go first: the short form is its prefix
        result = result
            .replaceAll(`${SERVICE_DNS_PLACEHOLDER}${CLUSTER_DOMAIN}`, `${fqdn}${CLUSTER_DOMAIN}`)
            .replaceAll(SERVICE_DNS_PLACEHOLDER, fqdn)
            .replaceAll(`${context.projectName}${NAME_SUFFIXES.METRICS_SERVICE}`, service);
    }

    return result.replaceAll(
        `${context.projectName}${NAME_SUFFIXES.SELF_SIGNED_ISSUER}`,
        `${PLACEHOLDERS.CHART_NAME}${NAME_SUFFIXES.SELF_SIGNED_ISSUER}`
    );
}

/**
 * Renames a scaffolded ServiceMonitor to `<chart name>-<suffix>`, where the
 * suffix is its name without the project prefix. Custom names stay as they are.
 */
export function templateServiceMonitorNames(content: string, context: PassContext): string {
    const { resource, projectName } = context;
    if (resource.kind !== KINDS.SERVICE_MONITOR || resource.name === '') return content;

    const prefix = `${projectName}-`;
    let suffix: string;
    if (resource.name.startsWith(prefix) && resource.name.length > prefix.length) {
        suffix = resource.name.slice(prefix.length);
    } else if (resource.name === NAME_SUFFIXES.SERVICE_MONITOR) {
        suffix = resource.name;
    } else {
        return content;
    }

    const nameLine = new RegExp(`^([ \\t]*)name:[ \\t]*${escapeRegExp(resource.name)}[ \\t]*$`, 'gm');
    return content.replace(nameLine, (_match: string, indent: string) =>
        `${indent}name: ${PLACEHOLDERS.CHART_NAME}-${suffix}`
    );
}

export function substituteManagedByLabel(content: string): string {
    return content.replace(MANAGED_BY_KUSTOMIZE, `$1app.kubernetes.io/managed-by: ${PLACEHOLDERS.RELEASE_SERVICE}`);
}
