import { Command, CommandRunner, Option } from 'nest-commander';
import { FoodItemSeederService } from './food-item-seeder.service';

interface SeedCommandOptions {
  clear?: boolean;
  stats?: boolean;
}

@Command({
  name: 'seed',
  description: 'Load the built-in menu into the food catalog',
})
export class SeedCommand extends CommandRunner {
  constructor(private readonly seederService: FoodItemSeederService) {
    super();
  }

  async run(_passedParams: string[], options: SeedCommandOptions): Promise<void> {
    if (options.stats) {
      const stats = await this.seederService.getStats();
      /* eslint-disable no-console */
      console.log('\nFood catalog:');
      console.log(`   Total items:    ${stats.totalItems}`);
      console.log(`   Cheapest:       ${stats.cheapest ?? '-'}`);
      console.log(`   Most expensive: ${stats.mostExpensive ?? '-'}`);
      /* eslint-enable no-console */
      return;
    }

    const written = options.clear
      ? await this.seederService.reseed()
      : await this.seederService.seed();

    // eslint-disable-next-line no-console
    console.log(`\nSeed completed: ${written} food items`);
  }

  @Option({
    flags: '-c, --clear',
    description: 'Remove every food item before seeding',
  })
  parseClear(): boolean {
    return true;
  }

  @Option({
    flags: '-s, --stats',
    description: 'Show catalog statistics instead of seeding',
  })
  parseStats(): boolean {
    return true;
  }
}
