import { DecimalInput } from '../utils/math';

/**
 * A single position as reported by the statement-parsing and pricing
 * collaborators, already converted into the reporting currency.
 */
export interface HoldingSnapshot {
    symbol: string;
    quantity: DecimalInput;
    price: DecimalInput;
}

export interface PortfolioSnapshot {
    holdings: HoldingSnapshot[];
    /** Free cash in the reporting currency */
    cash?: DecimalInput;
    /** Quotes for configured symbols that are not held yet */
    prices?: Record<string, DecimalInput>;
}
