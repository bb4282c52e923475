/**
 * Shopping Agent
 *
 * Prices the ingredients the user still has to buy across the configured
 * grocery delivery platforms and recommends the cheapest one. Items come from
 * the pantry check and the recipe when those ran first, otherwise from the
 * ingredients named in the query.
 */
import { z } from 'zod';
import { BaseAdapter, type AdapterConfig } from './base-adapter.js';
import {
  priorOutput,
  type AgentRequest,
  type IngredientLine,
  type PlatformQuote,
  type ShoppingResult,
} from './types.js';
import type { ShoppingConfig } from '../config/schema.js';
import { mergeIngredients, parseIngredientList } from '../inventory/ingredients.js';
import { PermanentAgentError } from '../errors.js';

export const DEFAULT_SHOPPING_INSTRUCTION = `You are a shopping assistant that compares grocery prices across delivery platforms.
For the items and platforms given, estimate the total basket price and the delivery time on each platform.

Respond with a JSON object only:
{"platforms": [{"platform": string, "total": number, "delivery_time": string}]}

- Include exactly the platforms you are asked about.
- Totals are numbers in the requested currency, without symbols.`;

const QuoteSchema = z.object({
  platforms: z
    .array(
      z.object({
        platform: z.string().min(1),
        total: z.coerce.number().nonnegative(),
        delivery_time: z.coerce.string().optional(),
      })
    )
    .min(1),
});

export class ShoppingAdapter extends BaseAdapter<'shopping'> {
  readonly id = 'shopping' as const;
  private readonly shopping: ShoppingConfig;

  constructor(config: AdapterConfig, shopping: ShoppingConfig) {
    super(config);
    this.shopping = shopping;
  }

  protected async run(request: AgentRequest): Promise<ShoppingResult> {
    const items = this.itemsToBuy(request);
    const currency = this.shopping.currency;

    if (items.length === 0) {
      return { kind: 'shopping', items, quotes: [], bestOption: '', totalCost: 0, currency };
    }

    const platforms = this.platformsFor(request.entities['platform']);
    const list = items.map((i) => (i.amount ? `${i.amount} ${i.name}` : i.name)).join(', ');
    const answer = await this.ask(
      `Compare prices in ${currency} for these ingredients across ${platforms.join(', ')}: ${list}`,
      QuoteSchema,
      request.signal
    );

    const budget = parseBudget(request.entities['max_price']);
    const wanted = new Set(platforms.map((p) => p.toLowerCase()));
    const quotes: PlatformQuote[] = answer.platforms
      .filter((q) => wanted.has(q.platform.toLowerCase()))
      .map((q) => ({
        platform: q.platform.toLowerCase(),
        total: q.total,
        deliveryTime: q.delivery_time,
        withinBudget: budget === undefined || q.total <= budget,
      }));

    if (quotes.length === 0) {
      throw new PermanentAgentError(`No price quotes for ${platforms.join(', ')}`);
    }

    const best = cheapest(quotes);

    return {
      kind: 'shopping',
      items,
      quotes,
      bestOption: best.platform,
      totalCost: best.total,
      currency,
    };
  }

  private itemsToBuy(request: AgentRequest): IngredientLine[] {
    const inventory = priorOutput(request.visiblePriorOutputs, 'inventory');
    const recipe = priorOutput(request.visiblePriorOutputs, 'recipe');

    if (inventory || recipe) {
      return mergeIngredients(inventory?.missing ?? [], recipe?.missingIngredients ?? []);
    }

    return parseIngredientList(request.entities['ingredients']);
  }

  private platformsFor(requested: string | undefined): string[] {
    if (!requested) {
      return this.shopping.platforms;
    }
    const names = requested.split(',').map((p) => p.trim().toLowerCase());
    const matching = this.shopping.platforms.filter((p) => names.includes(p.toLowerCase()));
    if (matching.length === 0) {
      throw new PermanentAgentError(`Unsupported platform: ${requested}`);
    }
    return matching;
  }
}

/** First quote with the lowest total; quote order breaks ties. */
export function cheapest(quotes: PlatformQuote[]): PlatformQuote {
  return quotes.reduce((best, quote) => (quote.total < best.total ? quote : best));
}

export function parseBudget(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const amount = Number.parseFloat(value.replace(/[^\d.]/g, ''));
  return Number.isFinite(amount) ? amount : undefined;
}
