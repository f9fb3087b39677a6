/**
 * Manager Container Passes
 *
 * Expose the controller-manager container's image, env, resources and
 * security contexts through values. Every pass here works inside the list
 * item of the container named `manager` and leaves other containers alone.
 */

import { MANAGER_CONTAINER } from '../knowledge/resource-kinds.js';
import {
    findContainer,
    findKeyLine,
    keyIndentOf,
    keyPrefixOf,
    locateBlock,
    splitLines,
    toLineRecord,
    type BlockMode
} from '../parser/line-model.js';
import { CONTROLLER_MANAGER_VALUES, VALUES_PATHS, valuesBlock } from '../templater/directives.js';
import { guardedBlockEdit, type BlockEdit } from '../templater/reentry.js';

// ==========================================
// TYPES
// ==========================================

interface ValuesField {
    /** YAML key in the container */
    key: string;
    /** Field under `.Values.controllerManager` */
    field: string;
    mode: BlockMode;
    fallback: '[]' | '{}';
}

const ENV_FIELD: ValuesField = { key: 'env', field: 'env', mode: 'sequence', fallback: '[]' };
const RESOURCES_FIELD: ValuesField = { key: 'resources', field: 'resources', mode: 'mapping', fallback: '{}' };

const MANAGER_NAME_LINE = `name: ${MANAGER_CONTAINER}`;

// ==========================================
// IMAGE
// ==========================================

/**
 * Replaces the manager's `image:` with repository/tag values and emits a
 * templated `imagePullPolicy:` right after it. Any `imagePullPolicy:` the
 * container already had is dropped.
 */
export function templateImageReference(content: string): string {
    if (!content.includes(MANAGER_NAME_LINE)) return content;

    const lines = splitLines(content);
    const container = findContainer(lines, MANAGER_CONTAINER);
    if (!container) return content;

    const imageIndex = findKeyLine(lines, container, 'image');
    if (imageIndex === null) return content;
    if (lines[imageIndex].includes(VALUES_PATHS.IMAGE_REPOSITORY)) return content;

    const image = toLineRecord(lines[imageIndex], imageIndex);
    const replacement = [
        `${keyPrefixOf(image)}image: "{{ ${VALUES_PATHS.IMAGE_REPOSITORY} }}:{{ ${VALUES_PATHS.IMAGE_TAG} }}"`,
        `${keyIndentOf(image)}imagePullPolicy: {{ ${VALUES_PATHS.IMAGE_PULL_POLICY} }}`
    ];

    const result: string[] = [];
    for (let i = 0; i < lines.length; i++) {
        if (i === imageIndex) {
            result.push(...replacement);
            continue;
        }
        if (i >= container.start && i < container.end) {
            const record = toLineRecord(lines[i], i);
            if (record.key === 'imagePullPolicy' && record.keyColumn === container.keyColumn && !record.isListItem) {
                continue;
            }
        }
        result.push(lines[i]);
    }

    return result.join('\n');
}

// ==========================================
// ENV & RESOURCES
// ==========================================

function locateValuesField(target: ValuesField) {
    return (lines: string[]): BlockEdit | null => {
        const container = findContainer(lines, MANAGER_CONTAINER);
        if (!container) return null;

        const keyIndex = findKeyLine(lines, container, target.key);
        if (keyIndex === null) {
            // Absent: insert a fresh block right after the container's name
            const name = toLineRecord(lines[container.nameLine], container.nameLine);
            const indent = keyIndentOf(name);
            return {
                start: container.nameLine + 1,
                end: container.nameLine + 1,
                replacement: [`${indent}${target.key}:`, ...valuesBlock(target.field, `${indent}  `, target.fallback)]
            };
        }

        const key = toLineRecord(lines[keyIndex], keyIndex);
        const block = locateBlock(lines, keyIndex, target.mode);
        return {
            start: keyIndex,
            end: block.end,
            replacement: [
                `${keyPrefixOf(key)}${target.key}:`,
                ...valuesBlock(target.field, `${keyIndentOf(key)}  `, target.fallback)
            ]
        };
    };
}

const envPass = guardedBlockEdit(`${CONTROLLER_MANAGER_VALUES}.env`, locateValuesField(ENV_FIELD));
const resourcesPass = guardedBlockEdit(`${CONTROLLER_MANAGER_VALUES}.resources`, locateValuesField(RESOURCES_FIELD));

export function templateEnvironmentVariables(content: string): string {
    if (!content.includes(MANAGER_NAME_LINE)) return content;
    return envPass(content);
}

export function templateResources(content: string): string {
    if (!content.includes(MANAGER_NAME_LINE)) return content;
    return resourcesPass(content);
}

// ==========================================
// SECURITY CONTEXTS
// ==========================================

/**
 * A `securityContext:` whose block is directly followed by a sibling
 * `serviceAccountName:` is the pod-level one.
 */
function isFollowedByServiceAccountName(lines: readonly string[], keyIndex: number): boolean {
    const block = locateBlock(lines, keyIndex, 'mapping');
    if (block.end >= lines.length) return false;

    const next = toLineRecord(lines[block.end], block.end);
    return next.key === 'serviceAccountName' && next.keyColumn === block.keyColumn;
}

function securityContextEdit(lines: readonly string[], keyIndex: number, field: string): BlockEdit {
    const key = toLineRecord(lines[keyIndex], keyIndex);
    const block = locateBlock(lines, keyIndex, 'mapping');
    return {
        start: keyIndex,
        end: block.end,
        replacement: [`${keyPrefixOf(key)}securityContext:`, ...valuesBlock(field, `${keyIndentOf(key)}  `, '{}')]
    };
}

const podSecurityContextPass = guardedBlockEdit(
    `${CONTROLLER_MANAGER_VALUES}.podSecurityContext`,
    (lines) => {
        for (let i = 0; i < lines.length; i++) {
            if (toLineRecord(lines[i], i).key !== 'securityContext') continue;
            if (isFollowedByServiceAccountName(lines, i)) {
                return securityContextEdit(lines, i, 'podSecurityContext');
            }
        }
        return null;
    }
);

const containerSecurityContextPass = guardedBlockEdit(
    `${CONTROLLER_MANAGER_VALUES}.securityContext`,
    (lines) => {
        const container = findContainer(lines, MANAGER_CONTAINER);
        if (!container) return null;

        const keyIndex = findKeyLine(lines, container, 'securityContext');
        if (keyIndex === null || isFollowedByServiceAccountName(lines, keyIndex)) return null;

        return securityContextEdit(lines, keyIndex, 'securityContext');
    }
);

export function templatePodSecurityContext(content: string): string {
    if (!content.includes('securityContext:')) return content;
    return podSecurityContextPass(content);
}

export function templateContainerSecurityContext(content: string): string {
    if (!content.includes(MANAGER_NAME_LINE) || !content.includes('securityContext:')) return content;
    return containerSecurityContextPass(content);
}
