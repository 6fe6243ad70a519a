import { Module } from '@nestjs/common';
import { KeyMaterialService } from './key-material.service';
import { KeygenProcessorService } from './keygen-processor.service';
import { ResultStore } from './result-store/result-store';
import { DynamoDBResultStore } from './result-store/dynamodb-result-store.service';

/** Pieces shared by the HTTP API and the queue workers. */
@Module({
  providers: [
    KeyMaterialService,
    KeygenProcessorService,
    { provide: ResultStore, useClass: DynamoDBResultStore },
  ],
  exports: [ResultStore, KeyMaterialService, KeygenProcessorService],
})
export class KeygenCoreModule {}
