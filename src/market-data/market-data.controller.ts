import { Controller, Get, HttpCode, HttpStatus, NotFoundException, Param, Query } from '@nestjs/common';
import { toNumber } from '../common/utils/decimal.util';
import { PriceService } from './price.service';
import { MarketPriceResponseDto } from './dto/market-price-response.dto';

@Controller('market-prices')
export class MarketDataController {
  constructor(private readonly priceService: PriceService) {}

  /**
   * Cached price, fetched from the provider on miss.
   *
   * GET /market-prices/BTC?refresh=true
   */
  @Get(':ticker')
  @HttpCode(HttpStatus.OK)
  async getPrice(
    @Param('ticker') ticker: string,
    @Query('refresh') refresh?: string,
  ): Promise<MarketPriceResponseDto> {
    const forceRefresh = refresh === 'true';
    const symbol = ticker.toUpperCase();
    const price = await this.priceService.getPrice(symbol, forceRefresh);

    if (!price) {
      throw new NotFoundException(`No price available for ${symbol}`);
    }

    return {
      ticker: symbol,
      price: toNumber(price),
      refreshed: forceRefresh,
      retrievedAt: new Date().toISOString(),
    };
  }
}
