import { Controller, Get, Param, ParseIntPipe } from '@nestjs/common';
import { CatalogService } from './catalog.service';
import { ProductResponseDto } from './dto';

@Controller('catalog')
export class CatalogController {
  constructor(private readonly catalogService: CatalogService) {}

  /**
   * GET /catalog
   * Every product with its current stock, ordered by id
   */
  @Get()
  async getCatalog(): Promise<ProductResponseDto[]> {
    const products = await this.catalogService.getCatalog();
    return ProductResponseDto.fromArray(products);
  }

  /**
   * GET /catalog/stock/:itemId
   * Current stock of one product, used by the order service
   */
  @Get('stock/:itemId')
  async getStock(@Param('itemId', ParseIntPipe) itemId: number): Promise<number> {
    return this.catalogService.getStock(itemId);
  }
}
