import { BomCategory, PartQuantity } from '../models/types';

/**
 * Collects the parts a calculator emits for one category.
 * Zero quantities are dropped; calculators never emit absent parts.
 */
export class PartList {
  private readonly items: PartQuantity[] = [];

  constructor(private readonly category: BomCategory) {}

  add(partNo: string, description: string, quantity: number): this {
    if (quantity !== 0) {
      this.items.push({ partNo, description, quantity, category: this.category });
    }
    return this;
  }

  toArray(): PartQuantity[] {
    return this.items.map(item => ({ ...item }));
  }
}

/**
 * Sums repeated part numbers, keeping first-seen order and the first emission's category.
 */
export function mergeParts(parts: PartQuantity[]): PartQuantity[] {
  const merged = new Map<string, PartQuantity>();
  for (const part of parts) {
    const existing = merged.get(part.partNo);
    if (existing) {
      existing.quantity += part.quantity;
    } else {
      merged.set(part.partNo, { ...part });
    }
  }
  return [...merged.values()];
}
