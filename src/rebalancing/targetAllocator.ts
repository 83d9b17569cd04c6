/**
 * Target Allocator: top-down distribution of a subtree's budget
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PASSES (per sibling list, in order):
 *   1. Proportional     target = total * expectedWeight
 *   2. Max clamp        target > max  -> max, buy blocked, excess into balance
 *   3. Min clamp        target < min  -> min, sell blocked, shortfall out of balance
 *   4. Dust             0 < |target - current| < minTradeVolume -> target = current
 *   5. Redistribution   while |balance| >= minTradeVolume: trades running
 *                       against the balance unwind towards current value,
 *                       then correctable children take the rest, smallest
 *                       pending trade first
 *   6. Spillover        whatever is left goes anywhere with headroom, ignoring
 *                       minTradeVolume, so the sum is exact whenever possible
 *   7. Recursion        every group child is allocated with its own target
 *
 * The returned residual is the part of the budget no child could take. It is
 * zero for any budget within the subtree's [min, max] bounds.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { AssetNode, transitionStatus } from '../portfolio/assetTree';
import { Decimal, ZERO, formatAmount, minDecimal, signOf } from '../utils/math';
import logger from '../utils/logger';

const LOG_PREFIX = '[ALLOCATOR]';

/**
 * Distribute `targetTotalValue` across `assets` and recurse into groups.
 *
 * @param name - Path of the subtree, for logging
 * @returns Residual balance that could not be placed (zero on success)
 */
export function calculateTargetValue(
    name: string,
    assets: AssetNode[],
    targetTotalValue: Decimal,
    minTradeVolume: Decimal
): Decimal {
    logger.debug(`${LOG_PREFIX} ${name}: distributing ${formatAmount(targetTotalValue)}`);

    for (const asset of assets) {
        asset.status = 'pending';
        asset.buyBlocked = false;
        asset.sellBlocked = false;
        asset.spilled = false;
        asset.targetValue = targetTotalValue.times(asset.expectedWeight);
    }

    let balance = ZERO;

    // Assets with a max value first, to release free cash
    for (const asset of assets) {
        if (asset.maxValue !== null && asset.targetValue.isGreaterThan(asset.maxValue)) {
            balance = balance.plus(asset.targetValue.minus(asset.maxValue));
            asset.targetValue = asset.maxValue;
            asset.buyBlocked = true;
            transitionStatus(asset, 'buy-blocked');
            logger.debug(`${LOG_PREFIX}   ${asset.path}: buying is blocked at ${formatAmount(asset.maxValue)}`);
        }
    }

    for (const asset of assets) {
        if (asset.targetValue.isLessThan(asset.minValue)) {
            balance = balance.plus(asset.targetValue.minus(asset.minValue));
            asset.targetValue = asset.minValue;
            asset.sellBlocked = true;
            transitionStatus(asset, 'sell-blocked');
            logger.debug(`${LOG_PREFIX}   ${asset.path}: selling is blocked at ${formatAmount(asset.minValue)}`);
        }
    }

    // Current values always lie within [min, max], so clamped assets snap too
    for (const asset of assets) {
        const difference = asset.targetValue.minus(asset.currentValue);
        const isDust = !difference.isZero() && difference.abs().isLessThan(minTradeVolume);

        if (isDust) {
            asset.targetValue = asset.currentValue;
            balance = balance.plus(difference);
            logger.debug(`${LOG_PREFIX}   ${asset.path}: ${formatAmount(difference)} is below min trade volume`);
        }
        if (asset.status === 'pending') {
            transitionStatus(asset, isDust ? 'dust' : 'correctable');
        }
    }

    balance = redistributeBalance(assets, balance, minTradeVolume);
    balance = spillBalance(assets, balance);

    if (!balance.isZero()) {
        logger.debug(`${LOG_PREFIX} ${name}: ${formatAmount(balance)} left unplaced`);
    }

    let residual = balance;
    for (const asset of assets) {
        if (asset.holding.kind === 'group') {
            residual = residual.plus(
                calculateTargetValue(asset.path, asset.holding.children, asset.targetValue, minTradeVolume)
            );
        }
    }

    return residual;
}

/**
 * Room a node has to move its target in the direction of `sign`
 * (null = unbounded upwards)
 */
function headroom(asset: AssetNode, sign: 1 | -1): Decimal | null {
    if (sign > 0) {
        return asset.maxValue === null ? null : asset.maxValue.minus(asset.targetValue);
    }
    return asset.targetValue.minus(asset.minValue);
}

/**
 * Largest move of |balance| a node can absorb, signed like the balance
 */
function absorbable(asset: AssetNode, balance: Decimal): Decimal {
    const sign = signOf(balance);
    if (sign === 0) return ZERO;

    const room = headroom(asset, sign);
    const volume = room === null ? balance.abs() : minDecimal(room, balance.abs());
    return volume.isGreaterThan(0) ? volume.times(sign) : ZERO;
}

function pendingDifference(asset: AssetNode): Decimal {
    return asset.targetValue.minus(asset.currentValue).abs();
}

interface Candidate {
    asset: AssetNode;
    index: number;
}

/**
 * Smallest pending trade first; equal differences keep sibling order
 */
function bySmallestTrade(a: Candidate, b: Candidate): number {
    return pendingDifference(a.asset).comparedTo(pendingDifference(b.asset)) || a.index - b.index;
}

function isSettled(balance: Decimal, minTradeVolume: Decimal): boolean {
    return balance.isZero() || balance.abs().isLessThan(minTradeVolume);
}

function moveTarget(asset: AssetNode, volume: Decimal, action: 'redistributed' | 'spilled'): void {
    asset.targetValue = asset.targetValue.plus(volume);
    if (action === 'spilled') {
        asset.spilled = true;
    }
    logger.debug(`${LOG_PREFIX}   ${asset.path}: ${action} ${formatAmount(volume)}`);
}

/**
 * Pull assets whose pending trade runs against the balance back towards their
 * current value, never past it. A converged portfolio is restored exactly here.
 */
function unwindTrades(
    assets: AssetNode[],
    balance: Decimal,
    minTradeVolume: Decimal,
    action: 'redistributed' | 'spilled'
): Decimal {
    const direction = signOf(balance);
    const candidates = assets
        .map((asset, index) => ({ asset, index }))
        .filter(({ asset }) =>
            asset.status !== 'dust' && signOf(asset.currentValue.minus(asset.targetValue)) === direction)
        .sort(bySmallestTrade);

    for (const { asset } of candidates) {
        if (isSettled(balance, minTradeVolume)) break;

        const toCurrent = asset.currentValue.minus(asset.targetValue);
        const room = absorbable(asset, balance);
        const volume = room.abs().isLessThan(toCurrent.abs()) ? room : toCurrent;
        if (volume.isZero()) continue;

        const remaining = toCurrent.minus(volume).abs();
        if (!remaining.isZero() && remaining.isLessThan(minTradeVolume)) continue;

        moveTarget(asset, volume, action);
        balance = balance.minus(volume);
    }

    return balance;
}

function redistributeBalance(assets: AssetNode[], balance: Decimal, minTradeVolume: Decimal): Decimal {
    if (isSettled(balance, minTradeVolume)) {
        return balance;
    }

    balance = unwindTrades(assets, balance, minTradeVolume, 'redistributed');

    const candidates = assets
        .map((asset, index) => ({ asset, index }))
        .filter(({ asset }) => asset.status === 'correctable')
        .sort(bySmallestTrade);

    for (const { asset } of candidates) {
        if (isSettled(balance, minTradeVolume)) break;

        let volume = absorbable(asset, balance);
        if (volume.isZero()) continue;

        // Never leave a trade below the minimum behind: settle at current value instead
        const resultingDifference = asset.targetValue.plus(volume).minus(asset.currentValue);
        if (!resultingDifference.isZero() && resultingDifference.abs().isLessThan(minTradeVolume)) {
            const toCurrent = asset.currentValue.minus(asset.targetValue);
            if (signOf(toCurrent) !== signOf(volume) || toCurrent.abs().isGreaterThan(volume.abs())) {
                continue;
            }
            volume = toCurrent;
        }

        moveTarget(asset, volume, 'redistributed');
        balance = balance.minus(volume);
    }

    return balance;
}

function spillBalance(assets: AssetNode[], balance: Decimal): Decimal {
    if (balance.isZero()) {
        return balance;
    }

    balance = unwindTrades(assets, balance, ZERO, 'spilled');

    const direction = signOf(balance);
    const tradingAlongside = assets.filter(
        asset => asset.status !== 'dust' && signOf(asset.targetValue.minus(asset.currentValue)) === direction
    );

    for (const tier of [tradingAlongside, assets]) {
        for (const asset of tier) {
            if (balance.isZero()) return balance;

            const volume = absorbable(asset, balance);
            if (volume.isZero()) continue;

            moveTarget(asset, volume, 'spilled');
            balance = balance.minus(volume);
        }
    }

    return balance;
}
