import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { CatalogUnavailableError, errorMessage } from '../../common/errors';

/**
 * HTTP client for the catalog service's stock endpoint.
 */
@Injectable()
export class CatalogClient {
  private readonly logger = new Logger(CatalogClient.name);

  constructor(private readonly httpService: HttpService) {}

  /**
   * Current stock of an item, or null when the catalog does not know it.
   */
  async getStock(itemId: number): Promise<number | null> {
    try {
      const response = await firstValueFrom(this.httpService.get<unknown>(`/catalog/stock/${itemId}`));
      const stock = Number(response.data);
      if (!Number.isInteger(stock) || stock < 0) {
        throw new Error(`Unexpected stock value for item ${itemId}: ${JSON.stringify(response.data)}`);
      }
      return stock;
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      this.logger.error(`An error occurred whilst contacting the catalog: ${errorMessage(error)}`);
      throw new CatalogUnavailableError(error);
    }
  }
}
