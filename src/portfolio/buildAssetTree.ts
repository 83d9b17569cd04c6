/**
 * Builds the AssetTree for one run from the allocation configuration and a
 * portfolio snapshot.
 *
 * Restriction flags are inherited: portfolio -> group -> asset, the nearest
 * explicit setting wins.
 */

import { AssetAllocationConfig, PortfolioAllocationConfig } from '../config/allocationConfig';
import { HoldingSnapshot, PortfolioSnapshot } from '../types';
import { ConfigurationError, InputError } from '../utils/errors';
import { Decimal, DecimalInput, ONE, ZERO, sumDecimals, toDecimal } from '../utils/math';
import { AssetNode, createGroup, createLeaf } from './assetTree';

interface InheritedRestrictions {
    restrictBuying: boolean;
    restrictSelling: boolean;
}

interface BuildContext {
    holdings: Map<string, HoldingSnapshot>;
    prices: Record<string, DecimalInput>;
    used: Set<string>;
}

function indexHoldings(holdings: HoldingSnapshot[]): Map<string, HoldingSnapshot> {
    const index = new Map<string, HoldingSnapshot>();

    for (const holding of holdings) {
        if (index.has(holding.symbol)) {
            throw new InputError(`Duplicate holding in portfolio snapshot: ${holding.symbol}`, {
                symbol: holding.symbol,
            });
        }
        index.set(holding.symbol, holding);
    }

    return index;
}

function buildNode(asset: AssetAllocationConfig, inherited: InheritedRestrictions, context: BuildContext): AssetNode {
    const restrictions: InheritedRestrictions = {
        restrictBuying: asset.restrictBuying ?? inherited.restrictBuying,
        restrictSelling: asset.restrictSelling ?? inherited.restrictSelling,
    };

    if (asset.assets !== undefined) {
        return createGroup({
            name: asset.name,
            weight: asset.weight,
            children: asset.assets.map(child => buildNode(child, restrictions, context)),
        });
    }

    if (asset.symbol === undefined) {
        throw new ConfigurationError(`"${asset.name}" has neither a symbol nor nested assets`);
    }

    const symbol = asset.symbol;
    const holding = context.holdings.get(symbol);
    context.used.add(symbol);

    let quantity: DecimalInput = ZERO;
    let price: DecimalInput;

    if (holding) {
        quantity = holding.quantity;
        price = holding.price;
    } else if (context.prices[symbol] !== undefined) {
        price = context.prices[symbol];
    } else {
        throw new InputError(`No price for ${symbol}: it is neither held nor quoted`, { symbol });
    }

    return createLeaf({
        name: asset.name,
        symbol,
        weight: asset.weight,
        quantity,
        price,
        ...restrictions,
    });
}

/**
 * @throws ConfigurationError if the snapshot holds symbols the configuration doesn't mention
 * @throws InputError on duplicate holdings, missing quotes or malformed decimals
 */
export function buildAssetTree(config: PortfolioAllocationConfig, snapshot: PortfolioSnapshot): AssetNode {
    const context: BuildContext = {
        holdings: indexHoldings(snapshot.holdings),
        prices: snapshot.prices ?? {},
        used: new Set<string>(),
    };

    const inherited: InheritedRestrictions = {
        restrictBuying: config.restrictBuying,
        restrictSelling: config.restrictSelling,
    };

    const root = createGroup({
        name: config.name,
        weight: ONE,
        children: config.assets.map(asset => buildNode(asset, inherited, context)),
    });

    const unexpected = [...context.holdings.keys()].filter(symbol => !context.used.has(symbol));
    if (unexpected.length > 0) {
        throw new ConfigurationError(
            `The following holdings of "${config.name}" are not in the asset allocation`,
            unexpected
        );
    }

    return root;
}

/**
 * Cash plus the value of every holding
 */
export function snapshotTotalValue(snapshot: PortfolioSnapshot): Decimal {
    const holdingsValue = sumDecimals(
        snapshot.holdings.map(holding =>
            toDecimal(holding.quantity, `${holding.symbol} quantity`).times(toDecimal(holding.price, `${holding.symbol} price`))
        )
    );
    return holdingsValue.plus(toDecimal(snapshot.cash ?? ZERO, 'cash'));
}
