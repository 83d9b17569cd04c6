/**
 * Plain-text rendering of a rebalanced tree, one line per node:
 *
 *   Retirement: 1000.00 -> 1000.00 (0.00)
 *     * Stocks (60%): 500.00 -> 600.00 (+100.00)
 *       * World (100%): 500.00 -> 600.00 (+100.00)
 *     * Bonds (40%): 500.00 -> 400.00 (-100.00) [sell blocked]
 */

import { REBALANCE_CONFIG } from '../config/constants';
import { RebalanceResult } from '../rebalancing/rebalancePortfolio';
import { formatAmount, formatPercent, formatSignedAmount } from '../utils/math';
import { AssetNode, walkTree } from './assetTree';

function describeFlags(node: AssetNode): string {
    const flags: string[] = [];
    if (node.buyBlocked) flags.push('buy blocked');
    if (node.sellBlocked) flags.push('sell blocked');
    if (node.status === 'uncorrectable') flags.push('uncorrectable');
    return flags.length > 0 ? ` [${flags.join(', ')}]` : '';
}

export function formatAssetTree(root: AssetNode): string[] {
    const lines: string[] = [];

    walkTree(root, (node, depth) => {
        const values =
            `${formatAmount(node.currentValue)} -> ${formatAmount(node.targetValue)} ` +
            `(${formatSignedAmount(node.targetValue.minus(node.currentValue))})`;

        if (depth === 0) {
            lines.push(`${node.name}: ${values}${describeFlags(node)}`);
        } else {
            const indent = REBALANCE_CONFIG.REPORT_INDENT.repeat(depth);
            lines.push(`${indent}* ${node.name} (${formatPercent(node.expectedWeight)}): ${values}${describeFlags(node)}`);
        }
    });

    return lines;
}

export function formatRebalanceReport(result: RebalanceResult): string[] {
    const header = result.ok
        ? `Rebalanced "${result.tree.name}" to ${formatAmount(result.targetTotal)}, ` +
          `${formatAmount(result.unallocatedCash)} left in cash`
        : `Unable to rebalance "${result.tree.name}": ${result.failure.message}`;

    return [header, ...formatAssetTree(result.tree)];
}
