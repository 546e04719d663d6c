export { LoggerModule } from './logger.module';
export { AppLoggerService } from './app-logger.service';
