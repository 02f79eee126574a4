import { DocumentStore } from './document_store.js';

export type ReferenceKind = 'branch' | 'resource' | 'user';

export interface ReferenceValidator {
  exists(kind: ReferenceKind, key: string): Promise<boolean>;
}

// Resolves references against the reference-data collections of the same store:
// branches by code, resources by id, users by email or id.
export class StoreReferenceValidator implements ReferenceValidator {
  constructor(private readonly store: DocumentStore) {}

  async exists(kind: ReferenceKind, key: string): Promise<boolean> {
    switch (kind) {
      case 'branch':
        return (await this.store.find('branch', { code: key })).length > 0;
      case 'resource':
        return (await this.store.findById('resource', key)) !== undefined;
      case 'user': {
        if ((await this.store.find('user', { email: key.toLowerCase() })).length > 0) return true;
        return (await this.store.findById('user', key)) !== undefined;
      }
    }
  }
}
