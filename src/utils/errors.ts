/**
 * Error taxonomy for the rebalancing engine.
 *
 * ConfigurationError and InputError abort a run before any allocation pass.
 * ReconciliationFailure is the typed outcome of a run whose total cannot be
 * placed anywhere in the tree; rebalancePortfolio returns it as a value.
 */

import BigNumber from 'bignumber.js';
import { REBALANCE_CONFIG } from '../config/constants';

export class RebalanceError extends Error {
    constructor(
        message: string,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = 'RebalanceError';
    }
}

/**
 * Allocation configuration or tree shape is unusable (weights, bounds, unknown holdings)
 */
export class ConfigurationError extends RebalanceError {
    constructor(
        public readonly reason: string,
        public readonly issues: string[] = []
    ) {
        super(
            `[CONFIGURATION_ERROR] ${reason}` + (issues.length > 0 ? `: ${issues.join('; ')}` : ''),
            { issues }
        );
        this.name = 'ConfigurationError';
    }
}

/**
 * Malformed data handed over by an upstream collaborator. Not retryable.
 */
export class InputError extends RebalanceError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super(`[INPUT_ERROR] ${reason}`, context);
        this.name = 'InputError';
    }
}

/**
 * Internal state machine misuse - indicates a bug, not bad input
 */
export class InvariantViolation extends RebalanceError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super(`[INVARIANT_VIOLATION] ${reason}`, context);
        this.name = 'InvariantViolation';
    }
}

export type ReconciliationKind = 'debt' | 'surplus';

export interface ReconciliationDetails {
    kind: ReconciliationKind;
    amount: BigNumber;
    /** Path of the subtree the unresolved amount originated in */
    subtree: string;
    /** Nodes that pinned the amount: uncorrectable for debt, buy-blocked for surplus */
    blockingNodes: string[];
}

export class ReconciliationFailure extends RebalanceError {
    public readonly kind: ReconciliationKind;
    public readonly amount: BigNumber;
    public readonly subtree: string;
    public readonly blockingNodes: string[];

    constructor(details: ReconciliationDetails) {
        const what = details.kind === 'debt' ? 'Unresolved debt' : 'Unplaced surplus';
        super(
            `[RECONCILIATION_FAILURE] ${what} of ${details.amount.toFixed(REBALANCE_CONFIG.REPORT_AMOUNT_DECIMALS)} ` +
                `in "${details.subtree}"`,
            {
                kind: details.kind,
                amount: details.amount.toFixed(),
                subtree: details.subtree,
                blockingNodes: details.blockingNodes,
            }
        );
        this.name = 'ReconciliationFailure';
        this.kind = details.kind;
        this.amount = details.amount;
        this.subtree = details.subtree;
        this.blockingNodes = details.blockingNodes;
    }
}
