/**
 * Templater Types
 */

// ==========================================
// RESOURCE DESCRIPTOR
// ==========================================

/**
 * Read-only identity of the manifest being templated, supplied by the caller.
 * The templater never mutates it.
 */
export interface ResourceDescriptor {
    readonly kind: string;
    readonly apiVersion: string;
    readonly name: string;
    /** Often blank before templating */
    readonly namespace: string;
}

// ==========================================
// PASSES
// ==========================================

export interface PassContext {
    resource: ResourceDescriptor;
    /** Project identifier used to recognise hardcoded names */
    projectName: string;
}

/**
 * One text-to-text rewrite. Passes only communicate through the text they
 * return.
 */
export interface TemplatePass {
    name: string;
    /** Restricts the pass to some resources; runs for all when omitted */
    appliesTo?: (resource: ResourceDescriptor) => boolean;
    run: (content: string, context: PassContext) => string;
}

// ==========================================
// OPTIONS & RESULTS
// ==========================================

export interface TemplaterOptions {
    projectName: string;
    /** Print a per-pass breakdown to the console */
    verbose: boolean;
}

export interface PassBreakdown {
    pass: number;
    name: string;
    changed: boolean;
    duration: number;
}

export interface TemplateResult {
    content: string;
    /** Name of the conditional-wrap rule that matched the resource */
    wrapRule: string;
    isValid: boolean;
    errors: string[];
    passBreakdown: PassBreakdown[];
}
