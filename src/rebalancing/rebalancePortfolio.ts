/**
 * Rebalance Run: Orchestration of the Rebalancing Passes
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * FLOW:
 *   1. Validate tree and parameters          -> ConfigurationError (thrown)
 *   2. Restriction calculator (bottom-up)
 *   3. target = totalValue - minCashAssets
 *   4. target < root.min  -> debt resolver    -> ReconciliationFailure('debt')
 *      otherwise          -> target allocator -> residual != 0 is a
 *                                                ReconciliationFailure
 *   5. Success: every node becomes `resolved`
 *
 * A ReconciliationFailure is RETURNED, not thrown, unless strict mode is on.
 * An unresolved amount is never dropped silently.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { AssetNode, PATH_SEPARATOR, collectLeaves, resetTree, transitionStatus, walkTree } from '../portfolio/assetTree';
import { REBALANCE_CONFIG } from '../config/constants';
import { ConfigurationError, ReconciliationFailure } from '../utils/errors';
import { Decimal, DecimalInput, ZERO, formatAmount, toDecimal } from '../utils/math';
import logger from '../utils/logger';
import { applyRestrictions } from './restrictions';
import { calculateTargetValue } from './targetAllocator';
import { sellOverboughtAssets } from './debtResolver';
import { validateAssetTree, validateRestrictionBounds } from './validation';

const LOG_PREFIX = '[REBALANCE]';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface RebalanceParams {
    /** Total portfolio value in the reporting currency, cash included */
    totalValue: DecimalInput;
    minTradeVolume: DecimalInput;
    /** Cash kept out of the assets */
    minCashAssets?: DecimalInput;
    /** Throw the ReconciliationFailure instead of returning it */
    strict?: boolean;
}

export interface RebalanceSuccess {
    ok: true;
    tree: AssetNode;
    currentTotal: Decimal;
    targetTotal: Decimal;
    /** Part of totalValue deliberately left in cash */
    unallocatedCash: Decimal;
}

export interface RebalanceFailure {
    ok: false;
    tree: AssetNode;
    failure: ReconciliationFailure;
}

export type RebalanceResult = RebalanceSuccess | RebalanceFailure;

// ═══════════════════════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Compute target values for every node of `root`, mutating the tree in place.
 *
 * @throws ConfigurationError on an invalid tree or parameters
 * @throws InputError on malformed decimals
 * @throws ReconciliationFailure only in strict mode
 */
export function rebalancePortfolio(root: AssetNode, params: RebalanceParams): RebalanceResult {
    const totalValue = toDecimal(params.totalValue, 'total value');
    const minTradeVolume = toDecimal(params.minTradeVolume, 'min trade volume');
    const minCashAssets = toDecimal(params.minCashAssets ?? ZERO, 'min cash assets');
    const strict = params.strict ?? REBALANCE_CONFIG.STRICT_MODE;

    const parameterIssues: string[] = [];
    if (totalValue.isNegative()) parameterIssues.push(`total value ${totalValue.toFixed()} is negative`);
    if (minTradeVolume.isNegative()) parameterIssues.push(`min trade volume ${minTradeVolume.toFixed()} is negative`);
    if (minCashAssets.isNegative()) parameterIssues.push(`min cash assets ${minCashAssets.toFixed()} is negative`);
    if (minCashAssets.isGreaterThan(totalValue)) {
        parameterIssues.push(`min cash assets ${minCashAssets.toFixed()} exceed total value ${totalValue.toFixed()}`);
    }
    if (parameterIssues.length > 0) {
        throw new ConfigurationError('Invalid rebalancing parameters', parameterIssues);
    }

    validateAssetTree(root);
    resetTree(root);
    applyRestrictions(root);
    validateRestrictionBounds(root);

    const targetTotal = totalValue.minus(minCashAssets);
    const children = root.holding.kind === 'group' ? root.holding.children : [];

    logger.info(
        `${LOG_PREFIX} ${root.path}: current ${formatAmount(root.currentValue)}, target ${formatAmount(targetTotal)}, ` +
        `min trade volume ${formatAmount(minTradeVolume)}`
    );

    root.targetValue = targetTotal;
    transitionStatus(root, 'correctable');

    let failure: ReconciliationFailure | null = null;

    if (targetTotal.isLessThan(root.minValue)) {
        const resolution = sellOverboughtAssets(root.path, children, targetTotal, minTradeVolume);
        if (resolution.status === 'debt') {
            root.targetValue = targetTotal.plus(resolution.amount);
            failure = new ReconciliationFailure({
                kind: 'debt',
                amount: resolution.amount,
                subtree: commonSubtree(root.path, resolution.uncorrectable),
                blockingNodes: resolution.uncorrectable,
            });
        }
    } else {
        const residual = calculateTargetValue(root.path, children, targetTotal, minTradeVolume);
        if (!residual.isZero()) {
            const kind = residual.isGreaterThan(0) ? 'surplus' : 'debt';
            const blockingNodes = collectLeaves(root)
                .filter(leaf => (kind === 'surplus' ? leaf.buyBlocked : leaf.sellBlocked))
                .map(leaf => leaf.path);

            root.targetValue = targetTotal.minus(residual);
            failure = new ReconciliationFailure({
                kind,
                amount: residual.abs(),
                subtree: commonSubtree(root.path, blockingNodes),
                blockingNodes,
            });
        }
    }

    if (failure) {
        transitionStatus(root, 'uncorrectable');
        logger.warn(`${LOG_PREFIX} ${failure.message}`);
        if (strict) {
            throw failure;
        }
        return { ok: false, tree: root, failure };
    }

    walkTree(root, node => {
        if (node.status !== 'uncorrectable') {
            transitionStatus(node, 'resolved');
        }
    });
    logger.info(`${LOG_PREFIX} ${root.path}: rebalanced to ${formatAmount(targetTotal)}`);

    return {
        ok: true,
        tree: root,
        currentTotal: root.currentValue,
        targetTotal,
        unallocatedCash: minCashAssets,
    };
}

/**
 * Deepest group containing every blocking node, or the root when there are none
 */
export function commonSubtree(rootPath: string, nodePaths: string[]): string {
    if (nodePaths.length === 0) {
        return rootPath;
    }

    const parents = nodePaths.map(path => path.split(PATH_SEPARATOR).slice(0, -1));
    const common: string[] = [];

    for (let depth = 0; depth < parents[0].length; depth++) {
        const segment = parents[0][depth];
        if (!parents.every(parent => parent[depth] === segment)) break;
        common.push(segment);
    }

    return common.length > 0 ? common.join(PATH_SEPARATOR) : rootPath;
}
