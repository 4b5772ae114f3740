import { plainToInstance } from 'class-transformer';
import { IsInt, IsNotEmpty, IsString, Min, validateSync } from 'class-validator';
import seedProducts from './seed/products.json';
import { Product } from './catalog-store';

class SeedProduct {
  @IsInt()
  @Min(1)
  id!: number;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsInt()
  @Min(0)
  quantity!: number;
}

/**
 * Validates seed records and rejects duplicate ids.
 */
export function parseSeedProducts(records: unknown[]): Product[] {
  const seen = new Set<number>();

  return records.map((record, index) => {
    const product = plainToInstance(SeedProduct, record);
    const errors = validateSync(product);
    if (errors.length > 0) {
      const details = errors.flatMap(error => Object.values(error.constraints ?? {}));
      throw new Error(`Invalid seed product at index ${index}: ${details.join(', ')}`);
    }
    if (seen.has(product.id)) {
      throw new Error(`Duplicate seed product id ${product.id}`);
    }
    seen.add(product.id);
    return { id: product.id, name: product.name, quantity: product.quantity };
  });
}

export const loadDefaultSeedProducts = (): Product[] => parseSeedProducts(seedProducts);
