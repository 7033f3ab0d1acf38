/**
 * Firestore / Cloud Storage access through the Firebase Admin SDK.
 * On Cloud Run credentials come from ADC; locally from
 * GOOGLE_APPLICATION_CREDENTIALS or the Firebase emulators.
 */

import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { initializeApp, getApps, type App } from 'firebase-admin/app';
import { getFirestore, type Firestore, type CollectionReference } from 'firebase-admin/firestore';
import { getStorage } from 'firebase-admin/storage';
import { StorageError } from '../common/errors.js';

export const COLLECTIONS = {
  plans: 'plans',
  settings: 'settings',
  apiKeys: 'apiKeys',
} as const;

type Bucket = ReturnType<ReturnType<typeof getStorage>['bucket']>;

@Injectable()
export class FirestoreService implements OnModuleInit {
  private readonly logger = new Logger(FirestoreService.name);
  private app?: App;
  private db?: Firestore;

  constructor(private readonly config: ConfigService) {}

  onModuleInit() {
    const existing = getApps();
    if (existing.length === 0) {
      const projectId = this.config.get<string>('FIREBASE_PROJECT_ID');
      const storageBucket = this.config.get<string>('FIREBASE_STORAGE_BUCKET');
      this.app = initializeApp({ projectId, storageBucket });
      this.logger.log(`Firebase Admin SDK initialised (projectId: ${projectId ?? 'ADC default'})`);
    } else {
      this.app = existing[0];
    }
    this.db = getFirestore(this.app);
  }

  /** Firestore instance */
  getDb(): Firestore {
    if (!this.db) {
      throw new StorageError('Firestore is not initialised');
    }
    return this.db;
  }

  collection(name: (typeof COLLECTIONS)[keyof typeof COLLECTIONS]): CollectionReference {
    return this.getDb().collection(name);
  }

  /** Default Cloud Storage bucket for uploads and exports */
  bucket(): Bucket {
    if (!this.app) {
      throw new StorageError('Firebase app is not initialised');
    }
    return getStorage(this.app).bucket();
  }
}

/** Firestore rejects undefined; strip it recursively before writing */
export function removeUndefined<T>(obj: T): T {
  if (obj === undefined || obj === null) {
    return obj;
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => removeUndefined(item)) as T;
  }
  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      if (v !== undefined) {
        result[k] = removeUndefined(v);
      }
    }
    return result as T;
  }
  return obj;
}
