/**
 * Asset Tree: Data Model for a Rebalancing Run
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * A portfolio is a tree of weighted nodes. Every node is either a GROUP of
 * sibling nodes or a LEAF holding (symbol, quantity, price). Traversal code
 * switches on `holding.kind`; there is no node class hierarchy.
 *
 * INVARIANTS:
 *   1. Sibling expectedWeight values sum to 1
 *   2. group.currentValue === sum(children.currentValue)
 *   3. After a successful run: minValue <= targetValue <= maxValue (null = unbounded)
 *
 * The tree is built fresh for each run and mutated in place by the
 * restriction, allocation and debt-resolution passes.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Decimal, DecimalInput, ZERO, sumDecimals, toDecimal } from '../utils/math';
import { InvariantViolation } from '../utils/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Per-node status. `pending` on entry to a pass, one of the intermediate
 * classifications while the pass runs, `resolved` or `uncorrectable` at the end.
 */
export type AssetStatus =
    | 'pending'
    | 'buy-blocked'
    | 'sell-blocked'
    | 'dust'
    | 'correctable'
    | 'forced'
    | 'resolved'
    | 'uncorrectable';

export interface GroupHolding {
    kind: 'group';
    children: AssetNode[];
}

export interface LeafHolding {
    kind: 'leaf';
    symbol: string;
    quantity: Decimal;
    price: Decimal;
}

export type AssetHolding = GroupHolding | LeafHolding;

export interface AssetNode {
    name: string;
    /** Full name: ancestor names joined by PATH_SEPARATOR */
    path: string;
    expectedWeight: Decimal;
    currentValue: Decimal;

    // Computed by the restriction and allocation passes
    targetValue: Decimal;
    minValue: Decimal;
    maxValue: Decimal | null;

    restrictBuying: boolean;
    restrictSelling: boolean;
    buyBlocked: boolean;
    sellBlocked: boolean;
    /** Target moved by the spillover pass, so its trade may be below the minimum */
    spilled: boolean;
    status: AssetStatus;

    holding: AssetHolding;
}

export interface LeafOptions {
    name: string;
    symbol: string;
    weight: DecimalInput;
    quantity: DecimalInput;
    price: DecimalInput;
    restrictBuying?: boolean;
    restrictSelling?: boolean;
}

export interface GroupOptions {
    name: string;
    weight: DecimalInput;
    children: AssetNode[];
}

export const PATH_SEPARATOR = ' / ';

// ═══════════════════════════════════════════════════════════════════════════════
// STATUS STATE MACHINE
// ═══════════════════════════════════════════════════════════════════════════════

const ALLOWED_TRANSITIONS: Record<AssetStatus, readonly AssetStatus[]> = {
    'pending': ['buy-blocked', 'sell-blocked', 'dust', 'correctable'],
    'buy-blocked': ['resolved'],
    'sell-blocked': ['resolved'],
    'dust': ['correctable', 'forced', 'resolved'],
    'correctable': ['dust', 'forced', 'resolved', 'uncorrectable'],
    'forced': ['correctable', 'resolved'],
    'resolved': [],
    'uncorrectable': [],
};

export function canTransition(from: AssetStatus, to: AssetStatus): boolean {
    return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Move a node to a new status.
 *
 * @throws InvariantViolation on a transition the state machine does not allow
 */
export function transitionStatus(node: AssetNode, next: AssetStatus): void {
    if (!canTransition(node.status, next)) {
        throw new InvariantViolation(
            `Illegal status transition for "${node.path}": ${node.status} -> ${next}`,
            { path: node.path, from: node.status, to: next }
        );
    }
    node.status = next;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════════

export function createLeaf(options: LeafOptions): AssetNode {
    const quantity = toDecimal(options.quantity, `${options.name} quantity`);
    const price = toDecimal(options.price, `${options.name} price`);

    return {
        name: options.name,
        path: options.name,
        expectedWeight: toDecimal(options.weight, `${options.name} weight`),
        currentValue: quantity.times(price),
        targetValue: ZERO,
        minValue: ZERO,
        maxValue: null,
        restrictBuying: options.restrictBuying ?? false,
        restrictSelling: options.restrictSelling ?? false,
        buyBlocked: false,
        sellBlocked: false,
        spilled: false,
        status: 'pending',
        holding: { kind: 'leaf', symbol: options.symbol, quantity, price },
    };
}

export function createGroup(options: GroupOptions): AssetNode {
    const group: AssetNode = {
        name: options.name,
        path: options.name,
        expectedWeight: toDecimal(options.weight, `${options.name} weight`),
        currentValue: sumDecimals(options.children.map(child => child.currentValue)),
        targetValue: ZERO,
        minValue: ZERO,
        maxValue: null,
        restrictBuying: false,
        restrictSelling: false,
        buyBlocked: false,
        sellBlocked: false,
        spilled: false,
        status: 'pending',
        holding: { kind: 'group', children: options.children },
    };

    assignPaths(group, options.name);
    return group;
}

function assignPaths(node: AssetNode, path: string): void {
    node.path = path;
    for (const child of getChildren(node)) {
        assignPaths(child, path + PATH_SEPARATOR + child.name);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TRAVERSAL
// ═══════════════════════════════════════════════════════════════════════════════

export function getChildren(node: AssetNode): AssetNode[] {
    return node.holding.kind === 'group' ? node.holding.children : [];
}

/**
 * Depth-first, parents before children, siblings in configured order
 */
export function walkTree(node: AssetNode, visit: (node: AssetNode, depth: number) => void, depth: number = 0): void {
    visit(node, depth);
    for (const child of getChildren(node)) {
        walkTree(child, visit, depth + 1);
    }
}

export function countNodes(node: AssetNode): number {
    let count = 0;
    walkTree(node, () => {
        count += 1;
    });
    return count;
}

export function findNode(root: AssetNode, path: string): AssetNode | null {
    if (root.path === path) return root;
    for (const child of getChildren(root)) {
        const found = findNode(child, path);
        if (found) return found;
    }
    return null;
}

export function collectLeaves(root: AssetNode): AssetNode[] {
    const leaves: AssetNode[] = [];
    walkTree(root, node => {
        if (node.holding.kind === 'leaf') {
            leaves.push(node);
        }
    });
    return leaves;
}

/**
 * Clear everything a previous run computed so the tree can be processed again
 */
export function resetTree(root: AssetNode): void {
    walkTree(root, node => {
        node.targetValue = ZERO;
        node.minValue = ZERO;
        node.maxValue = null;
        node.buyBlocked = false;
        node.sellBlocked = false;
        node.spilled = false;
        node.status = 'pending';
    });
}
