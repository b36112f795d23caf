import { Global, Module } from '@nestjs/common';

import { validateEnvironmentVariables } from 'src/engine/core-modules/environment/environment-variables';
import { EnvironmentService } from 'src/engine/core-modules/environment/environment.service';

@Global()
@Module({
  providers: [
    {
      provide: EnvironmentService,
      useFactory: () =>
        new EnvironmentService(validateEnvironmentVariables(process.env)),
    },
  ],
  exports: [EnvironmentService],
})
export class EnvironmentModule {}
