import { Product } from '../catalog-store';

export class ProductResponseDto {
  constructor(
    readonly id: number,
    readonly name: string,
    readonly quantity: number,
  ) {}

  static from(product: Product): ProductResponseDto {
    return new ProductResponseDto(product.id, product.name, product.quantity);
  }

  static fromArray(products: Product[]): ProductResponseDto[] {
    return products.map(product => ProductResponseDto.from(product));
  }
}
