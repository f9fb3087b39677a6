/**
 * Manifest Splitter
 *
 * Feeds a multi-document kustomize build through the templater: documents are
 * split on `---`, described with js-yaml, templated one by one and joined
 * back. Documents the templater elides are dropped from the output.
 */

import * as yaml from 'js-yaml';

import type { HelmTemplater } from '../templater/helm-templater.js';
import type { ResourceDescriptor } from '../templater/types.js';

const DOCUMENT_SEPARATOR = /^---[ \t]*$/m;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, field: string): string {
    const value = record[field];
    return typeof value === 'string' ? value : '';
}

export function splitDocuments(content: string): string[] {
    return content
        .split(DOCUMENT_SEPARATOR)
        .map((doc) => doc.replace(/^\n/, ''))
        .filter((doc) => doc.trim() !== '');
}

/**
 * Reads kind, apiVersion, name and namespace from an unstructured object.
 * Objects without a kind are not resources.
 */
export function descriptorFromObject(value: unknown): ResourceDescriptor | null {
    if (!isRecord(value)) return null;

    const kind = stringField(value, 'kind');
    if (kind === '') return null;

    const metadata = isRecord(value.metadata) ? value.metadata : {};
    return {
        kind,
        apiVersion: stringField(value, 'apiVersion'),
        name: stringField(metadata, 'name'),
        namespace: stringField(metadata, 'namespace')
    };
}

export function describeManifest(document: string): ResourceDescriptor | null {
    let parsed: unknown;
    try {
        parsed = yaml.load(document);
    } catch (error) {
        if (error instanceof yaml.YAMLException) return null;
        throw error;
    }
    return descriptorFromObject(parsed);
}

/**
 * Templates every document of a multi-document stream. Documents that are
 * not Kubernetes resources pass through unchanged.
 */
export function templateManifests(content: string, templater: HelmTemplater): string {
    const outputs: string[] = [];

    for (const document of splitDocuments(content)) {
        const resource = describeManifest(document);
        const templated = resource ? templater.apply(document, resource) : document;
        if (templated === '') continue;
        outputs.push(templated.endsWith('\n') ? templated : `${templated}\n`);
    }

    return outputs.join('---\n');
}
