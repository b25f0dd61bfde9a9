import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { CustomerModule } from './customer/customer.module';
import { loadAppConfig } from './shared/config/app.config';

@Module({
  imports: [
    // Structured logging
    LoggerModule.forRootAsync({
      useFactory: () => {
        const { log } = loadAppConfig();
        return {
          pinoHttp: {
            transport: log.pretty
              ? { target: 'pino-pretty', options: { colorize: true } }
              : undefined,
            level: log.level,
          },
        };
      },
    }),

    // Feature modules
    CustomerModule,
  ],
})
export class AppModule {}
