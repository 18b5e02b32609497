import { Module } from '@nestjs/common';

import { SourcesManagerService } from './sources-manager.service';
import { SOURCES_PROVIDERS } from './sources.providers';
import { HttpClientModule } from '../common';

@Module({
  imports: [HttpClientModule],
  providers: [SourcesManagerService, ...SOURCES_PROVIDERS],
  exports: [SourcesManagerService],
})
export class SourcesModule {}
