/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * PORTFOLIO REBALANCER: PUBLIC API
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Typical use:
 *   const config = loadPortfolioConfig('portfolio.yaml');
 *   const result = rebalanceSnapshot(config, snapshot);
 *   formatRebalanceReport(result).forEach(line => console.log(line));
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export {
    type AssetAllocationConfig,
    type PortfolioAllocationConfig,
    parseWeight,
    parsePortfolioConfig,
    loadPortfolioConfig,
    collectSymbols,
} from './config/allocationConfig';
export { REBALANCE_CONFIG } from './config/constants';

export {
    type AssetNode,
    type AssetHolding,
    type AssetStatus,
    type GroupHolding,
    type LeafHolding,
    PATH_SEPARATOR,
    createGroup,
    createLeaf,
    canTransition,
    transitionStatus,
    getChildren,
    walkTree,
    countNodes,
    findNode,
    collectLeaves,
    resetTree,
} from './portfolio/assetTree';
export { buildAssetTree, snapshotTotalValue } from './portfolio/buildAssetTree';
export { formatAssetTree, formatRebalanceReport } from './portfolio/report';

export { type ValueBounds, calculateRestrictions, applyRestrictions } from './rebalancing/restrictions';
export { calculateTargetValue } from './rebalancing/targetAllocator';
export { type DebtResolution, sellOverboughtAssets } from './rebalancing/debtResolver';
export { collectTreeIssues, validateAssetTree, validateRestrictionBounds } from './rebalancing/validation';
export {
    type RebalanceParams,
    type RebalanceResult,
    type RebalanceSuccess,
    type RebalanceFailure,
    rebalancePortfolio,
    commonSubtree,
} from './rebalancing/rebalancePortfolio';
export { type SnapshotRebalanceOptions, rebalanceSnapshot } from './rebalancing/rebalanceSnapshot';

export { type HoldingSnapshot, type PortfolioSnapshot } from './types';
export {
    RebalanceError,
    ConfigurationError,
    InputError,
    InvariantViolation,
    ReconciliationFailure,
    type ReconciliationKind,
} from './utils/errors';
export { Decimal, type DecimalInput, toDecimal } from './utils/math';
