/**
 * Controller-Manager Args Passes
 *
 * Restructures the manager's `args:` list into a values-driven loop and
 * guards the certificate path flags on the features that provide the certs.
 */

import { MANAGER_CONTAINER } from '../knowledge/resource-kinds.js';
import { findContainer, leadingWhitespace, splitLines } from '../parser/line-model.js';
import {
    CLOSE_GUARD,
    CONDITIONS,
    ELSE_GUARD,
    VALUES_PATHS,
    openGuard,
    wrapLines,
    type GuardCondition
} from '../templater/directives.js';
import { hasMarker, isGuardedBy } from '../templater/reentry.js';

// ==========================================
// CONSTANTS
// ==========================================

const ARGS_BLOCK = /^([ \t]*(?:-[ \t]+)?)args:\n((?:[ \t]+-.*(?:\n|$))+)/m;

const FLAGS = {
    METRICS_BIND_ADDRESS: '--metrics-bind-address',
    HEALTH_PROBE_BIND_ADDRESS: '--health-probe-bind-address',
    WEBHOOK_CERT_PATH: '--webhook-cert-path',
    METRICS_CERT_PATH: '--metrics-cert-path'
} as const;

const CERT_PATH_GUARDS: ReadonlyArray<{ flag: string; condition: GuardCondition }> = [
    { flag: FLAGS.WEBHOOK_CERT_PATH, condition: CONDITIONS.CERT_MANAGER },
    { flag: FLAGS.METRICS_CERT_PATH, condition: CONDITIONS.CERT_MANAGER_AND_METRICS }
];

// ==========================================
// ARGS RESTRUCTURING
// ==========================================

interface ClassifiedArgs {
    metricsLine: string | null;
    healthLine: string | null;
    preserved: string[];
    itemIndent: string;
}

function classifyArgs(items: string[], fallbackIndent: string): ClassifiedArgs {
    const result: ClassifiedArgs = { metricsLine: null, healthLine: null, preserved: [], itemIndent: fallbackIndent };
    let indentFound = false;

    for (const raw of items) {
        const line = raw.replace(/\r$/, '');
        const trimmed = line.trim();
        if (trimmed === '') continue;

        if (!indentFound) {
            result.itemIndent = leadingWhitespace(line);
            indentFound = true;
        }

        if (trimmed.includes(FLAGS.METRICS_BIND_ADDRESS)) {
            result.metricsLine = line;
        } else if (trimmed.includes(FLAGS.HEALTH_PROBE_BIND_ADDRESS)) {
            result.healthLine = line;
        } else if (trimmed.includes(FLAGS.WEBHOOK_CERT_PATH) || trimmed.includes(FLAGS.METRICS_CERT_PATH)) {
            result.preserved.push(line);
        }
        // Anything else is superseded by the values loop
    }

    return result;
}

function buildArgsBlock(prefix: string, args: ClassifiedArgs): string[] {
    const block = [`${prefix}args:`];

    if (args.metricsLine !== null) {
        const indent = leadingWhitespace(args.metricsLine);
        block.push(
            `${indent}${openGuard(CONDITIONS.METRICS)}`,
            args.metricsLine,
            `${indent}${ELSE_GUARD}`,
            `${indent}# Bind to :0 to disable the controller-runtime managed metrics server`,
            `${indent}- ${FLAGS.METRICS_BIND_ADDRESS}=0`,
            `${indent}${CLOSE_GUARD}`
        );
    }
    if (args.healthLine !== null) {
        block.push(args.healthLine);
    }

    block.push(
        `${args.itemIndent}{{- range ${VALUES_PATHS.ARGS} }}`,
        `${args.itemIndent}- {{ . }}`,
        `${args.itemIndent}${CLOSE_GUARD}`,
        ...args.preserved
    );

    return block;
}

/**
 * Rewrites the manager's first `args:` list. The metrics bind address gets a
 * `metrics.enable` guard with a `=0` fallback, the health probe address and
 * the cert path flags are kept, every other item is replaced by a loop over
 * `.Values.controllerManager.args`.
 */
export function templateControllerManagerArgs(content: string): string {
    if (!content.includes(`name: ${MANAGER_CONTAINER}`)) return content;

    const lines = splitLines(content);
    const container = findContainer(lines, MANAGER_CONTAINER);
    if (!container) return content;

    const section = lines.slice(container.start, container.end).join('\n');
    const match = ARGS_BLOCK.exec(section);
    if (!match) return content;

    // Probe the matched lines plus a few after them for an earlier rewrite
    const matchStart = container.start + splitLines(section.slice(0, match.index)).length - 1;
    const matchLines = splitLines(match[0].replace(/\n$/, '')).length;
    if (hasMarker(lines, matchStart, matchStart + matchLines, VALUES_PATHS.ARGS)) return content;

    const [, prefix, itemsBlock] = match;
    const args = classifyArgs(splitLines(itemsBlock), `${' '.repeat(prefix.length)}  `);
    const rewritten = buildArgsBlock(prefix, args).join('\n') + (match[0].endsWith('\n') ? '\n' : '');

    const updated = section.slice(0, match.index) + rewritten + section.slice(match.index + match[0].length);
    return [
        ...lines.slice(0, container.start),
        updated,
        ...lines.slice(container.end)
    ].join('\n');
}

// ==========================================
// CERT PATH CONDITIONALS
// ==========================================

/**
 * Guards every `- --webhook-cert-path=` line on cert-manager and every
 * `- --metrics-cert-path=` line on cert-manager and metrics. Lines already
 * under their guard are skipped.
 */
export function makeContainerArgsConditional(content: string): string {
    let result = content;

    for (const { flag, condition } of CERT_PATH_GUARDS) {
        if (!result.includes(flag)) continue;

        const pattern = new RegExp(`^([ \\t]+)-[ \\t]*${flag}=`);
        const lines = splitLines(result);
        const output: string[] = [];

        for (let i = 0; i < lines.length; i++) {
            const match = lines[i].match(pattern);
            if (!match || isGuardedBy(lines, i, condition)) {
                output.push(lines[i]);
                continue;
            }
            output.push(...wrapLines([`${match[1]}${lines[i].trim()}`], match[1], condition));
        }

        result = output.join('\n');
    }

    return result;
}
