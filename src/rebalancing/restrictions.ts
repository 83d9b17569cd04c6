/**
 * Restriction Calculator: bottom-up feasible bounds
 *
 * Leaf:  min = current if restrict_selling else 0
 *        max = current if restrict_buying  else unbounded (null)
 * Group: min = sum(children.min)
 *        max = sum(children.max) if every child is bounded, else unbounded
 */

import { AssetNode } from '../portfolio/assetTree';
import { Decimal, ZERO } from '../utils/math';

export interface ValueBounds {
    minValue: Decimal;
    maxValue: Decimal | null;
}

/**
 * Compute and store bounds for every node of a sibling list.
 *
 * @returns Combined bounds of the list, i.e. the bounds of its parent
 */
export function calculateRestrictions(assets: AssetNode[]): ValueBounds {
    let totalMinValue = ZERO;
    let totalMaxValue = ZERO;
    let allWithMaxValue = true;

    for (const asset of assets) {
        const bounds = calculateNodeBounds(asset);

        asset.minValue = bounds.minValue;
        asset.maxValue = bounds.maxValue;

        totalMinValue = totalMinValue.plus(bounds.minValue);
        if (bounds.maxValue === null) {
            allWithMaxValue = false;
        } else {
            totalMaxValue = totalMaxValue.plus(bounds.maxValue);
        }
    }

    return {
        minValue: totalMinValue,
        maxValue: allWithMaxValue ? totalMaxValue : null,
    };
}

function calculateNodeBounds(asset: AssetNode): ValueBounds {
    switch (asset.holding.kind) {
        case 'group':
            return calculateRestrictions(asset.holding.children);
        case 'leaf':
            return {
                minValue: asset.restrictSelling ? asset.currentValue : ZERO,
                maxValue: asset.restrictBuying ? asset.currentValue : null,
            };
    }
}

/**
 * Run the calculator over a whole tree, root included
 */
export function applyRestrictions(root: AssetNode): ValueBounds {
    const bounds = calculateNodeBounds(root);
    root.minValue = bounds.minValue;
    root.maxValue = bounds.maxValue;
    return bounds;
}
