import { Global, Module } from '@nestjs/common';

import { KEYBOX_TIME_ZONE, resolveTimeZone } from './keybox.config';

@Global()
@Module({
  providers: [{ provide: KEYBOX_TIME_ZONE, useFactory: () => resolveTimeZone() }],
  exports: [KEYBOX_TIME_ZONE],
})
export class KeyboxConfigModule {}
