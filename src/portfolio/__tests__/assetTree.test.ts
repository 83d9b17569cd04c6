/**
 * Asset Tree Model Tests
 *
 * Construction, traversal and the node status state machine.
 */

import {
    AssetNode,
    canTransition,
    collectLeaves,
    countNodes,
    createGroup,
    createLeaf,
    findNode,
    resetTree,
    transitionStatus,
    walkTree,
} from '../assetTree';
import { InvariantViolation } from '../../utils/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

function sampleTree(): AssetNode {
    return createGroup({
        name: 'Portfolio',
        weight: 1,
        children: [
            createGroup({
                name: 'Stocks',
                weight: '0.6',
                children: [
                    createLeaf({ name: 'World', symbol: 'VT', weight: 1, quantity: 4, price: '102.5' }),
                ],
            }),
            createLeaf({ name: 'Bonds', symbol: 'BND', weight: '0.4', quantity: 3, price: 80, restrictSelling: true }),
        ],
    });
}

describe('construction', () => {
    test('leaf value is quantity times price', () => {
        const root = sampleTree();

        expect(findNode(root, 'Portfolio / Stocks / World')?.currentValue.toFixed()).toBe('410');
    });

    test('group value is the sum of its children', () => {
        const root = sampleTree();

        expect(root.currentValue.toFixed()).toBe('650');
        expect(findNode(root, 'Portfolio / Stocks')?.currentValue.toFixed()).toBe('410');
    });

    test('restriction flags default to false', () => {
        const root = sampleTree();

        expect(findNode(root, 'Portfolio / Stocks / World')?.restrictSelling).toBe(false);
        expect(findNode(root, 'Portfolio / Bonds')?.restrictSelling).toBe(true);
    });
});

describe('traversal', () => {
    test('walks parents before children with their depth', () => {
        const visited: string[] = [];
        walkTree(sampleTree(), (node, depth) => {
            visited.push(`${depth}:${node.name}`);
        });

        expect(visited).toEqual(['0:Portfolio', '1:Stocks', '2:World', '1:Bonds']);
    });

    test('counts nodes and collects leaves', () => {
        const root = sampleTree();

        expect(countNodes(root)).toBe(4);
        expect(collectLeaves(root).map(leaf => leaf.path)).toEqual(['Portfolio / Stocks / World', 'Portfolio / Bonds']);
    });

    test('findNode returns null for an unknown path', () => {
        expect(findNode(sampleTree(), 'Portfolio / Gold')).toBeNull();
    });

    test('resetTree clears computed values', () => {
        const root = sampleTree();
        walkTree(root, node => {
            node.targetValue = node.currentValue;
            node.maxValue = node.currentValue;
            node.buyBlocked = true;
            node.status = 'resolved';
        });

        resetTree(root);

        walkTree(root, node => {
            expect(node.targetValue.toFixed()).toBe('0');
            expect(node.maxValue).toBeNull();
            expect(node.buyBlocked).toBe(false);
            expect(node.status).toBe('pending');
        });
    });
});

describe('status state machine', () => {
    test('allows the classification and resolution paths', () => {
        expect(canTransition('pending', 'dust')).toBe(true);
        expect(canTransition('dust', 'forced')).toBe(true);
        expect(canTransition('forced', 'resolved')).toBe(true);
        expect(canTransition('correctable', 'uncorrectable')).toBe(true);
        expect(canTransition('correctable', 'correctable')).toBe(true);
    });

    test('terminal states do not move', () => {
        expect(canTransition('resolved', 'pending')).toBe(false);
        expect(canTransition('uncorrectable', 'resolved')).toBe(false);
        expect(canTransition('buy-blocked', 'correctable')).toBe(false);
    });

    test('an illegal transition throws and leaves the status unchanged', () => {
        const leaf = createLeaf({ name: 'World', symbol: 'VT', weight: 1, quantity: 1, price: 1 });
        transitionStatus(leaf, 'correctable');
        transitionStatus(leaf, 'resolved');

        expect(() => transitionStatus(leaf, 'dust')).toThrow(InvariantViolation);
        expect(leaf.status).toBe('resolved');
    });
});
