import type { Principal } from '@tokenline/shared';
import type { IIdentityVerifier } from '../interfaces/identity-verifier.js';
import { hashSecret, verifySecret, DEFAULT_SCRYPT_PARAMS, type ScryptParams } from '../../crypto/hash.js';
import { generateRandomBase64Url } from '../../crypto/random.js';
import { scopeService } from '../../services/scope-service.js';

interface StoredIdentity {
  identifier: string;
  subjectId: string;
  passwordHash: string;
  scopes: string[];
}

export interface AddIdentityInput {
  identifier: string;
  password: string;
  subjectId?: string;
  scopes?: string[];
}

/**
 * In-memory identity verifier for development and tests
 * Production deployments plug in their own user store.
 */
export class MemoryIdentityVerifier implements IIdentityVerifier {
  private byIdentifier = new Map<string, StoredIdentity>();
  private bySubject = new Map<string, StoredIdentity>();
  private dummyHash: Promise<string> | null = null;

  constructor(private readonly scryptParams: ScryptParams = DEFAULT_SCRYPT_PARAMS) {}

  async addIdentity(input: AddIdentityInput): Promise<Principal> {
    const identity: StoredIdentity = {
      identifier: input.identifier,
      subjectId: input.subjectId ?? generateRandomBase64Url(12),
      passwordHash: await hashSecret(input.password, this.scryptParams),
      scopes: scopeService.normalize(input.scopes ?? []),
    };

    this.byIdentifier.set(identity.identifier, identity);
    this.bySubject.set(identity.subjectId, identity);

    return { subjectId: identity.subjectId, scopes: [...identity.scopes] };
  }

  removeIdentity(identifier: string): boolean {
    const identity = this.byIdentifier.get(identifier);
    if (!identity) {
      return false;
    }
    this.byIdentifier.delete(identifier);
    this.bySubject.delete(identity.subjectId);
    return true;
  }

  async verifyCredentials(identifier: string, secret: string): Promise<Principal | null> {
    const identity = this.byIdentifier.get(identifier);

    // Unknown identifiers still pay for a hash check
    const passwordHash = identity?.passwordHash ?? (await this.getDummyHash());
    const matches = await verifySecret(secret, passwordHash);

    if (!identity || !matches) {
      return null;
    }

    return { subjectId: identity.subjectId, scopes: [...identity.scopes] };
  }

  async findPrincipal(subjectId: string): Promise<Principal | null> {
    const identity = this.bySubject.get(subjectId);
    return identity ? { subjectId: identity.subjectId, scopes: [...identity.scopes] } : null;
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = hashSecret(generateRandomBase64Url(24), this.scryptParams);
    }
    return this.dummyHash;
  }
}
