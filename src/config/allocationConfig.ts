/**
 * Allocation Configuration: schema and YAML loading
 *
 * Example (YAML):
 *
 *   name: Retirement
 *   min_trade_volume: 100
 *   restrict_selling: false
 *   assets:
 *     - name: Stocks
 *       weight: 60%
 *       assets:
 *         - { name: World, symbol: VT, weight: 100% }
 *     - name: Bonds
 *       symbol: BND
 *       weight: 40%
 *       restrict_buying: true
 */

import fs from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { PATH_SEPARATOR } from '../portfolio/assetTree';
import { ConfigurationError } from '../utils/errors';
import { Decimal, HUNDRED } from '../utils/math';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface AssetAllocationConfig {
    name: string;
    symbol?: string;
    /** Fraction of the parent, 0..1 */
    weight: Decimal;
    restrictBuying?: boolean;
    restrictSelling?: boolean;
    assets?: AssetAllocationConfig[];
}

export interface PortfolioAllocationConfig {
    name: string;
    minTradeVolume: Decimal | null;
    minCashAssets: Decimal;
    restrictBuying: boolean;
    restrictSelling: boolean;
    assets: AssetAllocationConfig[];
}

/** Shape of an asset entry as written in the configuration file */
interface RawAssetAllocationConfig {
    name: string;
    symbol?: string;
    weight: string;
    restrict_buying?: boolean;
    restrict_selling?: boolean;
    assets?: RawAssetAllocationConfig[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════════

const WEIGHT_PATTERN = /^(\d{1,3})%$/;

/**
 * Parse an integer percentage such as "40%" into a fraction.
 *
 * @returns null if the string is not a percentage between 0% and 100%
 */
export function parseWeight(value: string): Decimal | null {
    const match = WEIGHT_PATTERN.exec(value.trim());
    if (!match) return null;

    const percent = new Decimal(match[1]);
    if (percent.isGreaterThan(HUNDRED)) return null;

    return percent.div(HUNDRED);
}

// Node paths are names joined by PATH_SEPARATOR
const nameSchema = z
    .string()
    .min(1)
    .refine(
        name => !name.includes(PATH_SEPARATOR),
        name => ({ message: `"${name}" must not contain "${PATH_SEPARATOR}"` })
    );

const weightSchema = z.string().transform((value, ctx) => {
    const weight = parseWeight(value);
    if (weight === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid weight: ${value}` });
        return z.NEVER;
    }
    return weight;
});

const amountSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
    const amount = new Decimal(value);
    if (!amount.isFinite() || amount.isNegative()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid amount: ${value}` });
        return z.NEVER;
    }
    return amount;
});

const assetSchema: z.ZodType<AssetAllocationConfig, z.ZodTypeDef, RawAssetAllocationConfig> = z.lazy(() =>
    z
        .object({
            name: nameSchema,
            symbol: z.string().min(1).optional(),
            weight: weightSchema,
            restrict_buying: z.boolean().optional(),
            restrict_selling: z.boolean().optional(),
            assets: z.array(assetSchema).optional(),
        })
        .strict()
        .superRefine((asset, ctx) => {
            if ((asset.symbol === undefined) === (asset.assets === undefined)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `"${asset.name}" must have either a symbol or nested assets`,
                });
            }
        })
        .transform(asset => ({
            name: asset.name,
            symbol: asset.symbol,
            weight: asset.weight,
            restrictBuying: asset.restrict_buying,
            restrictSelling: asset.restrict_selling,
            assets: asset.assets,
        }))
);

const portfolioSchema = z
    .object({
        name: nameSchema,
        min_trade_volume: amountSchema.optional(),
        min_cash_assets: amountSchema.optional(),
        restrict_buying: z.boolean().optional(),
        restrict_selling: z.boolean().optional(),
        assets: z.array(assetSchema).min(1),
    })
    .strict();

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const location = issue.path.join('.');
        return location ? `${location}: ${issue.message}` : issue.message;
    });
}

/**
 * Validate a configuration object (as loaded from YAML or JSON).
 *
 * @throws ConfigurationError listing every schema violation or duplicate symbol
 */
export function parsePortfolioConfig(raw: unknown): PortfolioAllocationConfig {
    const parsed = portfolioSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError('Invalid portfolio configuration', formatIssues(parsed.error));
    }

    const config: PortfolioAllocationConfig = {
        name: parsed.data.name,
        minTradeVolume: parsed.data.min_trade_volume ?? null,
        minCashAssets: parsed.data.min_cash_assets ?? new Decimal(0),
        restrictBuying: parsed.data.restrict_buying ?? false,
        restrictSelling: parsed.data.restrict_selling ?? false,
        assets: parsed.data.assets,
    };

    const seen = new Set<string>();
    const duplicates: string[] = [];
    visitSymbols(config.assets, symbol => {
        if (seen.has(symbol)) {
            duplicates.push(`Duplicate symbol: ${symbol}`);
        }
        seen.add(symbol);
    });

    if (duplicates.length > 0) {
        throw new ConfigurationError(`Invalid "${config.name}" portfolio configuration`, duplicates);
    }

    return config;
}

/**
 * Read and validate a YAML portfolio configuration file.
 *
 * @throws ConfigurationError if the file can't be parsed or is invalid
 */
export function loadPortfolioConfig(filePath: string): PortfolioAllocationConfig {
    const source = fs.readFileSync(filePath, 'utf8');

    let raw: unknown;
    try {
        raw = yaml.load(source);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Unable to parse ${filePath}`, [reason]);
    }

    return parsePortfolioConfig(raw);
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════════════════

function visitSymbols(assets: AssetAllocationConfig[], visit: (symbol: string) => void): void {
    for (const asset of assets) {
        if (asset.symbol !== undefined) {
            visit(asset.symbol);
        }
        if (asset.assets !== undefined) {
            visitSymbols(asset.assets, visit);
        }
    }
}

/**
 * Every instrument symbol the configuration refers to, in configuration order
 */
export function collectSymbols(config: PortfolioAllocationConfig): Set<string> {
    const symbols = new Set<string>();
    visitSymbols(config.assets, symbol => symbols.add(symbol));
    return symbols;
}
