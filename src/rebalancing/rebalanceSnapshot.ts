import { REBALANCE_CONFIG } from '../config/constants';
import { PortfolioAllocationConfig } from '../config/allocationConfig';
import { buildAssetTree, snapshotTotalValue } from '../portfolio/buildAssetTree';
import { PortfolioSnapshot } from '../types';
import { DecimalInput } from '../utils/math';
import { RebalanceResult, rebalancePortfolio } from './rebalancePortfolio';

export interface SnapshotRebalanceOptions {
    /** Overrides cash + holdings, e.g. to plan a deposit or a withdrawal */
    totalValue?: DecimalInput;
    strict?: boolean;
}

/**
 * Build the tree for `config` from `snapshot` and rebalance it.
 *
 * The minimum trade volume comes from the configuration, falling back to
 * REBALANCE_MIN_TRADE_VOLUME.
 */
export function rebalanceSnapshot(
    config: PortfolioAllocationConfig,
    snapshot: PortfolioSnapshot,
    options: SnapshotRebalanceOptions = {}
): RebalanceResult {
    const tree = buildAssetTree(config, snapshot);

    return rebalancePortfolio(tree, {
        totalValue: options.totalValue ?? snapshotTotalValue(snapshot),
        minTradeVolume: config.minTradeVolume ?? REBALANCE_CONFIG.DEFAULT_MIN_TRADE_VOLUME,
        minCashAssets: config.minCashAssets,
        strict: options.strict,
    });
}
