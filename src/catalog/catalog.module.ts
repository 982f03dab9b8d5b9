import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  Buyer,
  BuyerOffer,
  BuyerServiceArea,
  Market,
  Offer,
  OfferExclusivity,
  RoutingPolicy,
  Source,
  ValidationPolicy,
  Vertical,
} from './entities';
import { CatalogRepository } from './catalog.repository';
import { CATALOG_STORE } from './interfaces/catalog-store.interface';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      Market,
      Vertical,
      Offer,
      Source,
      Buyer,
      BuyerOffer,
      BuyerServiceArea,
      OfferExclusivity,
      ValidationPolicy,
      RoutingPolicy,
    ]),
  ],
  providers: [
    CatalogRepository,
    {
      provide: CATALOG_STORE,
      useExisting: CatalogRepository,
    },
  ],
  exports: [CATALOG_STORE],
})
export class CatalogModule {}
