import { describe, it, expect } from 'vitest';
import {
    findContainer,
    findKeyLine,
    keyIndentOf,
    keyPrefixOf,
    locateBlock,
    toLineRecord
} from '../src/parser/line-model.js';

describe('toLineRecord', () => {
    it('should read indent, key and value of a plain mapping line', () => {
        const record = toLineRecord('    image: controller:latest', 7);
        expect(record).toMatchObject({
            index: 7,
            indent: 4,
            isListItem: false,
            key: 'image',
            value: 'controller:latest',
            keyColumn: 4
        });
    });

    it('should place the key column after the dash of a list item', () => {
        const record = toLineRecord('    - name: manager', 0);
        expect(record.isListItem).toBe(true);
        expect(record.key).toBe('name');
        expect(record.value).toBe('manager');
        expect(record.keyColumn).toBe(6);
        expect(keyIndentOf(record)).toBe('      ');
        expect(keyPrefixOf(record)).toBe('    - ');
    });

    it('should report no key for flags and directives', () => {
        expect(toLineRecord('  - --leader-elect', 0).key).toBeNull();
        expect(toLineRecord('  - --metrics-bind-address=:8443', 0).key).toBeNull();
        expect(toLineRecord('  {{- if .Values.metrics.enable }}', 0).key).toBeNull();
    });

    it('should report a null value for keys that open a block', () => {
        expect(toLineRecord('  env:', 0).value).toBeNull();
    });
});

describe('locateBlock', () => {
    const lines = [
        'spec:',
        '  containers:',
        '  - name: a',
        '    image: x',
        '  - name: b',
        '  volumes: []'
    ];

    it('should keep same-column list items in sequence mode', () => {
        expect(locateBlock(lines, 1, 'sequence')).toEqual({
            start: 1,
            end: 5,
            keyColumn: 2,
            indentText: '  '
        });
    });

    it('should stop at the first same-column line in mapping mode', () => {
        expect(locateBlock(lines, 1, 'mapping').end).toBe(2);
    });

    it('should treat the end of the document as a dedent', () => {
        expect(locateBlock(lines, 0).end).toBe(6);
    });

    it('should yield an empty body for a key followed by a sibling', () => {
        expect(locateBlock(['a:', 'b: 1'], 0).end).toBe(1);
    });

    it('should stop at a blank line', () => {
        expect(locateBlock(['a:', '  x: 1', '', '  y: 2'], 0).end).toBe(2);
    });

    it('should measure from the key column of a dash line', () => {
        const block = locateBlock([
            '      - env:',
            '        - name: A',
            '          value: b',
            '        image: x'
        ], 0, 'sequence');
        expect(block.keyColumn).toBe(8);
        expect(block.end).toBe(3);
    });
});

describe('findContainer', () => {
    const lines = [
        '      containers:',
        '      - args:',
        '        - --leader-elect',
        '        image: ctrl:v1',
        '        name: manager',
        '      - image: proxy:v1',
        '        name: kube-rbac-proxy',
        '      serviceAccountName: sa'
    ];

    it('should find a container whose name is not on the dash line', () => {
        expect(findContainer(lines, 'manager')).toEqual({ start: 1, end: 5, keyColumn: 8, nameLine: 4 });
    });

    it('should end the last container at the pod-level keys', () => {
        expect(findContainer(lines, 'kube-rbac-proxy')).toEqual({ start: 5, end: 7, keyColumn: 8, nameLine: 6 });
    });

    it('should find a container named on its dash line', () => {
        const range = findContainer(['  - name: manager', '    image: x'], 'manager');
        expect(range).toEqual({ start: 0, end: 2, keyColumn: 4, nameLine: 0 });
    });

    it('should return null when no container has the name', () => {
        expect(findContainer(lines, 'sidecar')).toBeNull();
    });

    it('should only find keys at the container key column', () => {
        const range = findContainer(lines, 'manager');
        expect(range).not.toBeNull();
        if (!range) return;
        expect(findKeyLine(lines, range, 'image')).toBe(3);
        expect(findKeyLine(lines, range, 'args')).toBe(1);
        expect(findKeyLine(lines, range, 'serviceAccountName')).toBeNull();
    });
});
