import { AssetNode, createGroup, createLeaf, findNode, getChildren, walkTree } from '../../src/portfolio/assetTree';
import { applyRestrictions } from '../../src/rebalancing/restrictions';
import { calculateTargetValue } from '../../src/rebalancing/targetAllocator';
import { Decimal, DecimalInput, sumDecimals, toDecimal } from '../../src/utils/math';

export interface LeafRestrictions {
    restrictBuying?: boolean;
    restrictSelling?: boolean;
}

/**
 * Leaf whose current value is `current` (quantity = current, price = 1)
 */
export function leaf(name: string, weight: DecimalInput, current: DecimalInput, restrictions: LeafRestrictions = {}): AssetNode {
    return createLeaf({ name, symbol: name, weight, quantity: current, price: 1, ...restrictions });
}

export function group(name: string, weight: DecimalInput, children: AssetNode[]): AssetNode {
    return createGroup({ name, weight, children });
}

export function portfolio(children: AssetNode[]): AssetNode {
    return createGroup({ name: 'Portfolio', weight: 1, children });
}

export function childrenOf(node: AssetNode): AssetNode[] {
    return getChildren(node);
}

/**
 * Copy of a tree whose current values are the targets of a previous run
 */
export function atTargets(node: AssetNode): AssetNode {
    switch (node.holding.kind) {
        case 'group':
            return createGroup({
                name: node.name,
                weight: node.expectedWeight,
                children: node.holding.children.map(atTargets),
            });
        case 'leaf':
            return createLeaf({
                name: node.name,
                symbol: node.holding.symbol,
                weight: node.expectedWeight,
                quantity: node.targetValue,
                price: 1,
                restrictBuying: node.restrictBuying,
                restrictSelling: node.restrictSelling,
            });
    }
}

/**
 * Restrictions + allocator over the root's children, as a run would do it
 */
export function allocate(root: AssetNode, total: DecimalInput, minTradeVolume: DecimalInput): Decimal {
    applyRestrictions(root);
    root.targetValue = toDecimal(total);
    return calculateTargetValue(root.path, getChildren(root), toDecimal(total), toDecimal(minTradeVolume));
}

export function target(node: AssetNode): string {
    return node.targetValue.toFixed();
}

export function nodeAt(root: AssetNode, path: string): AssetNode {
    const node = findNode(root, path);
    if (node === null) {
        throw new Error(`No node at ${path}`);
    }
    return node;
}

export function targetAt(root: AssetNode, path: string): string {
    return target(nodeAt(root, path));
}

/**
 * Paths of groups whose children do not add up to the group's target
 */
export function conservationViolations(root: AssetNode): string[] {
    const violations: string[] = [];
    walkTree(root, node => {
        const children = getChildren(node);
        if (children.length === 0) return;
        const sum = sumDecimals(children.map(child => child.targetValue));
        if (!sum.isEqualTo(node.targetValue)) {
            violations.push(node.path);
        }
    });
    return violations;
}

export function rangeViolations(root: AssetNode): string[] {
    const violations: string[] = [];
    walkTree(root, node => {
        const belowMin = node.targetValue.isLessThan(node.minValue);
        const aboveMax = node.maxValue !== null && node.targetValue.isGreaterThan(node.maxValue);
        if (belowMin || aboveMax) {
            violations.push(node.path);
        }
    });
    return violations;
}

/**
 * Leaves traded against their restriction flags
 */
export function restrictionViolations(root: AssetNode): string[] {
    const violations: string[] = [];
    walkTree(root, node => {
        if (node.holding.kind !== 'leaf') return;
        const sold = node.targetValue.isLessThan(node.currentValue);
        const bought = node.targetValue.isGreaterThan(node.currentValue);
        if ((node.restrictSelling && sold) || (node.restrictBuying && bought)) {
            violations.push(node.path);
        }
    });
    return violations;
}

/**
 * Leaves with a nonzero trade below the minimum, skipping subtrees the
 * spillover pass moved
 */
export function granularityViolations(root: AssetNode, minTradeVolume: DecimalInput): string[] {
    const minimum = toDecimal(minTradeVolume);
    const violations: string[] = [];

    const visit = (node: AssetNode, spilled: boolean): void => {
        const touched = spilled || node.spilled;
        if (node.holding.kind === 'group') {
            node.holding.children.forEach(child => visit(child, touched));
            return;
        }
        const trade = node.targetValue.minus(node.currentValue).abs();
        if (!touched && !trade.isZero() && trade.isLessThan(minimum)) {
            violations.push(node.path);
        }
    };

    visit(root, false);
    return violations;
}

/**
 * Nodes whose target differs from their current value
 */
export function driftedNodes(root: AssetNode): string[] {
    const drifted: string[] = [];
    walkTree(root, node => {
        if (!node.targetValue.isEqualTo(node.currentValue)) {
            drifted.push(`${node.path}: ${node.currentValue.toFixed()} -> ${node.targetValue.toFixed()}`);
        }
    });
    return drifted;
}
