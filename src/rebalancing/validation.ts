/**
 * Eager checks run before any allocation pass.
 * Every problem found is collected so a single ConfigurationError lists them all.
 */

import { AssetNode, PATH_SEPARATOR, getChildren, walkTree } from '../portfolio/assetTree';
import { ConfigurationError } from '../utils/errors';
import { ONE, formatPercent, sumDecimals } from '../utils/math';

export function collectTreeIssues(root: AssetNode): string[] {
    const issues: string[] = [];

    if (root.holding.kind !== 'group') {
        issues.push(`Portfolio root "${root.path}" must be a group of assets`);
    }

    walkTree(root, node => {
        if (node.name.includes(PATH_SEPARATOR)) {
            issues.push(`"${node.path}" has "${PATH_SEPARATOR}" in its name`);
        }
        if (node.expectedWeight.isNegative()) {
            issues.push(`"${node.path}" has a negative weight`);
        }
        if (node.currentValue.isNegative()) {
            issues.push(`"${node.path}" has a negative current value`);
        }

        switch (node.holding.kind) {
            case 'leaf':
                if (node.holding.quantity.isNegative()) {
                    issues.push(`"${node.path}" has a negative quantity`);
                }
                if (node.holding.price.isNegative()) {
                    issues.push(`"${node.path}" has a negative price`);
                }
                break;
            case 'group': {
                const children = getChildren(node);
                if (children.length === 0) {
                    issues.push(`"${node.path}" has no assets`);
                    break;
                }

                const totalWeight = sumDecimals(children.map(child => child.expectedWeight));
                if (!totalWeight.isEqualTo(ONE)) {
                    issues.push(`Weights of "${node.path}" assets sum to ${formatPercent(totalWeight)} instead of 100%`);
                }
                break;
            }
        }
    });

    return issues;
}

/**
 * @throws ConfigurationError if weights or values make the tree unusable
 */
export function validateAssetTree(root: AssetNode): void {
    const issues = collectTreeIssues(root);
    if (issues.length > 0) {
        throw new ConfigurationError('Invalid asset allocation', issues);
    }
}

/**
 * Must run after the restriction calculator. The calculator itself never
 * produces min > max (a leaf's bounds are 0 or its current value, a group's
 * are sums), so this only fires on bounds set by hand.
 *
 * @throws ConfigurationError if any node has min_value > max_value
 */
export function validateRestrictionBounds(root: AssetNode): void {
    const issues: string[] = [];

    walkTree(root, node => {
        if (node.maxValue !== null && node.minValue.isGreaterThan(node.maxValue)) {
            issues.push(`"${node.path}" has inconsistent restrictions: min ${node.minValue.toFixed()} > max ${node.maxValue.toFixed()}`);
        }
    });

    if (issues.length > 0) {
        throw new ConfigurationError('Inconsistent restriction bounds', issues);
    }
}
