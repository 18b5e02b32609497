import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AppConfigService } from './config.service';
import { loader } from './loaders';

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      load: [loader],
      isGlobal: true,
      ignoreEnvFile: true,
      cache: true,
    }),
  ],
  providers: [AppConfigService],
  exports: [AppConfigService],
})
export class AppConfigModule {}
