/**
 * Resource Kind Registry
 *
 * Kinds, API versions and naming conventions the templater recognises in
 * controller project manifests.
 */

export const KINDS = {
    NAMESPACE: 'Namespace',
    CUSTOM_RESOURCE_DEFINITION: 'CustomResourceDefinition',
    CERTIFICATE: 'Certificate',
    ISSUER: 'Issuer',
    SERVICE: 'Service',
    SERVICE_MONITOR: 'ServiceMonitor',
    SERVICE_ACCOUNT: 'ServiceAccount',
    ROLE: 'Role',
    CLUSTER_ROLE: 'ClusterRole',
    ROLE_BINDING: 'RoleBinding',
    CLUSTER_ROLE_BINDING: 'ClusterRoleBinding',
    VALIDATING_WEBHOOK: 'ValidatingWebhookConfiguration',
    MUTATING_WEBHOOK: 'MutatingWebhookConfiguration',
    DEPLOYMENT: 'Deployment'
} as const;

export const API_VERSIONS = {
    CERT_MANAGER: 'cert-manager.io/v1',
    MONITORING: 'monitoring.coreos.com/v1'
} as const;

export const RBAC_KINDS: ReadonlySet<string> = new Set([
    KINDS.SERVICE_ACCOUNT,
    KINDS.ROLE,
    KINDS.CLUSTER_ROLE,
    KINDS.ROLE_BINDING,
    KINDS.CLUSTER_ROLE_BINDING
]);

export const WEBHOOK_KINDS: ReadonlySet<string> = new Set([
    KINDS.VALIDATING_WEBHOOK,
    KINDS.MUTATING_WEBHOOK
]);

/** Name fragments of the convenience admin/editor/viewer roles generated per API */
export const RBAC_HELPER_MARKERS = ['admin-role', 'editor-role', 'viewer-role'] as const;

export const METRICS_MARKER = 'metrics';

export const MANAGER_CONTAINER = 'manager';

// Name suffixes appended to the project name by the scaffolding
export const NAME_SUFFIXES = {
    NAMESPACE: '-system',
    SELF_SIGNED_ISSUER: '-selfsigned-issuer',
    METRICS_SERVICE: '-controller-manager-metrics-service',
    SERVICE_MONITOR: 'controller-manager-metrics-monitor'
} as const;
