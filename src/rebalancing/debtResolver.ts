/**
 * Debt Resolver: shrinking a subtree below what its holdings allow
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Used when a subtree must shrink to a budget smaller than its current value
 * and some children cannot sell down to their fair share.
 *
 * Each pass:
 *   - correctable budget = budget - sum(uncorrectable targets), weights
 *     renormalized by (1 - uncorrectable weight)
 *   - group children recurse; a group reporting debt becomes uncorrectable
 *   - a sell-restricted leaf, or one whose whole position is below the minimum
 *     trade volume, is pinned at its current value and becomes uncorrectable
 *   - a leaf whose sale would be below the minimum trade volume is held at its
 *     current value (dust); under forced selling it sells down to at most
 *     current - minTradeVolume to pay back debt
 *
 * TERMINATION:
 *   Every pass either moves a child to the uncorrectable set, escalates to
 *   forced selling (once), or ends the loop. Passes <= children + 2.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { AssetNode, transitionStatus } from '../portfolio/assetTree';
import { Decimal, ONE, ZERO, formatAmount, minDecimal, sumDecimals } from '../utils/math';
import logger from '../utils/logger';

const LOG_PREFIX = '[DEBT]';

export type DebtResolution =
    | { status: 'ok' }
    | {
          status: 'debt';
          amount: Decimal;
          /** Paths of every node pinned while producing the debt */
          uncorrectable: string[];
      };

/**
 * Fit `assets` into `targetTotalValue`, pinning what cannot be sold.
 *
 * On `debt`, the children sum to targetTotalValue + amount.
 */
export function sellOverboughtAssets(
    name: string,
    assets: AssetNode[],
    targetTotalValue: Decimal,
    minTradeVolume: Decimal
): DebtResolution {
    for (const asset of assets) {
        asset.status = 'pending';
    }

    const correctable = new Set<number>(assets.map((_, index) => index));
    const uncorrectable = new Set<number>();
    const pinned: string[] = [];

    let forceSelling = false;
    let correctableDebt = ZERO;

    const maxPasses = assets.length + 2;

    for (let pass = 1; pass <= maxPasses; pass++) {
        const uncorrectableIndexes = [...uncorrectable];
        const uncorrectableWeight = sumDecimals(uncorrectableIndexes.map(index => assets[index].expectedWeight));
        const uncorrectableValue = sumDecimals(uncorrectableIndexes.map(index => assets[index].targetValue));

        let correctableTotalValue = targetTotalValue.minus(uncorrectableValue);
        correctableDebt = ZERO;

        if (correctableTotalValue.isLessThan(0)) {
            correctableDebt = correctableTotalValue.abs();
            correctableTotalValue = ZERO;
        }

        const correctableIndexes = [...correctable].sort((a, b) => a - b);
        assignFairTargets(assets, correctableIndexes, correctableTotalValue, ONE.minus(uncorrectableWeight));

        let membershipChanged = false;
        const heldAsDust: number[] = [];

        for (const index of correctableIndexes) {
            const asset = assets[index];
            transitionStatus(asset, 'correctable');

            switch (asset.holding.kind) {
                case 'group': {
                    const result = sellOverboughtAssets(
                        asset.path, asset.holding.children, asset.targetValue, minTradeVolume);

                    if (result.status === 'debt') {
                        asset.targetValue = asset.targetValue.plus(result.amount);
                        correctableDebt = correctableDebt.plus(result.amount);

                        correctable.delete(index);
                        uncorrectable.add(index);
                        transitionStatus(asset, 'uncorrectable');
                        pinned.push(...result.uncorrectable);
                        membershipChanged = true;
                    }
                    break;
                }
                case 'leaf': {
                    if (!asset.currentValue.isGreaterThan(asset.targetValue)) break;

                    const shortfall = asset.currentValue.minus(asset.targetValue);

                    if (asset.restrictSelling || asset.currentValue.isLessThan(minTradeVolume)) {
                        asset.targetValue = asset.currentValue;
                        correctableDebt = correctableDebt.plus(shortfall);

                        correctable.delete(index);
                        uncorrectable.add(index);
                        transitionStatus(asset, 'uncorrectable');
                        pinned.push(asset.path);
                        membershipChanged = true;

                        logger.debug(`${LOG_PREFIX}   ${asset.path}: can't be sold, pinned at ${formatAmount(asset.currentValue)}`);
                    } else if (shortfall.isLessThan(minTradeVolume)) {
                        asset.targetValue = asset.currentValue;
                        correctableDebt = correctableDebt.plus(shortfall);
                        transitionStatus(asset, 'dust');
                        heldAsDust.push(index);
                    }
                    break;
                }
            }
        }

        if (forceSelling) {
            for (const index of heldAsDust) {
                if (correctableDebt.isZero()) break;

                const asset = assets[index];
                const volume = minDecimal(minTradeVolume, correctableDebt);

                asset.targetValue = asset.currentValue.minus(volume);
                correctableDebt = correctableDebt.minus(volume);
                transitionStatus(asset, 'forced');

                logger.debug(`${LOG_PREFIX}   ${asset.path}: forced to sell ${formatAmount(volume)}`);
            }
        }

        if (correctableDebt.isZero()) {
            return { status: 'ok' };
        }

        if (correctable.size === 0) {
            break;
        }

        if (!membershipChanged) {
            if (forceSelling) break;

            forceSelling = true;
            logger.debug(`${LOG_PREFIX} ${name}: ${formatAmount(correctableDebt)} of debt left, forcing sales`);
        }
    }

    logger.debug(`${LOG_PREFIX} ${name}: unable to resolve ${formatAmount(correctableDebt)} of debt`);
    return { status: 'debt', amount: correctableDebt, uncorrectable: pinned };
}

/**
 * Split the correctable budget by renormalized weight. The last child with a
 * nonzero weight (or the last child at all, when only zero weights are left)
 * takes the division remainder so the sum stays exact.
 */
function assignFairTargets(
    assets: AssetNode[],
    indexes: number[],
    totalValue: Decimal,
    divider: Decimal
): void {
    let assigned = ZERO;
    let lastWeighted = -1;

    for (const index of indexes) {
        const asset = assets[index];
        asset.targetValue = divider.isZero()
            ? ZERO
            : totalValue.times(asset.expectedWeight).div(divider);
        assigned = assigned.plus(asset.targetValue);

        if (!asset.expectedWeight.isZero()) {
            lastWeighted = index;
        }
    }

    if (lastWeighted < 0 && indexes.length > 0) {
        lastWeighted = indexes[indexes.length - 1];
    }

    if (lastWeighted >= 0) {
        const asset = assets[lastWeighted];
        asset.targetValue = asset.targetValue.plus(totalValue.minus(assigned));
    }
}
