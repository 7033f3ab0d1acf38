import { Global, Module } from '@nestjs/common';
import { FirestoreService } from './firestore.service.js';

/** Registered @Global() so every feature module can reach Firestore */
@Global()
@Module({
  providers: [FirestoreService],
  exports: [FirestoreService],
})
export class FirestoreModule {}
