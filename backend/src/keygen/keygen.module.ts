import { Module } from '@nestjs/common';
import { KeygenCoreModule } from './keygen-core.module';
import { KeygenController } from './keygen.controller';
import { KeygenService } from './keygen.service';
import { JobQueue, SqsJobQueue } from './job-queue';

@Module({
  imports: [KeygenCoreModule],
  controllers: [KeygenController],
  providers: [KeygenService, { provide: JobQueue, useClass: SqsJobQueue }],
})
export class KeygenModule {}
