import { Module } from '@nestjs/common';
import { MongoDBModule } from '@infrastructure/adapters';
import { FoodItemSeederService } from './food-item-seeder.service';
import { SeedCommand } from './seed.command';

/**
 * CLI commands that prepare the database.
 */
@Module({
  imports: [MongoDBModule],
  providers: [FoodItemSeederService, SeedCommand],
  exports: [FoodItemSeederService],
})
export class SeedsModule {}
