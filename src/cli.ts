import 'reflect-metadata';
import { CommandFactory } from 'nest-commander';
import { CliModule } from './cli.module';

// Usage: food-order-cli seed [--clear | --stats]
CommandFactory.run(CliModule, {
  logger: ['error', 'warn', 'log'],
  errorHandler: (error) => {
    // eslint-disable-next-line no-console
    console.error(error.message);
    process.exitCode = 1;
  },
}).catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exitCode = 1;
});
