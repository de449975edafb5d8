/**
 * Jenkins Credential Service
 *
 * Creates, updates and deletes credentials in the global system store or a
 * folder store. Every call returns the credential id.
 */

import type { JenkinsClient } from '../client/index.js';
import {
  credentialPayload,
  DEFAULT_CREDENTIAL_DOMAIN,
  type Credential,
  type CredentialStore,
} from '../types/credentials.js';
import { folderPath } from '../types/refs.js';
import { JenkinsError } from '../errors.js';

/**
 * Path of a credentials domain within a store.
 *
 * @throws {JenkinsError} MissingParameter for a folder store without folders
 */
export function credentialDomainPath(store: CredentialStore, domain = DEFAULT_CREDENTIAL_DOMAIN): string {
  const name = encodeURIComponent(domain || DEFAULT_CREDENTIAL_DOMAIN);
  if (store.type === 'system') {
    return `/credentials/store/system/domain/${name}`;
  }
  if (store.folders.length === 0) {
    throw JenkinsError.missingParameter('folder name should not be empty');
  }
  return `${folderPath(store.folders)}/credentials/store/folder/domain/${name}`;
}

export class CredentialService {
  constructor(private readonly client: JenkinsClient) {}

  async createCredential(store: CredentialStore, credential: Credential, domain?: string): Promise<string> {
    const path = `${credentialDomainPath(store, domain)}/createCredentials`;
    await this.client.postForm(path, {
      json: JSON.stringify({ '': '0', credentials: credentialPayload(credential) }),
    });
    return credential.id;
  }

  async updateCredential(store: CredentialStore, credential: Credential, domain?: string): Promise<string> {
    const path = `${credentialDomainPath(store, domain)}/credential/${encodeURIComponent(credential.id)}/updateSubmit`;
    await this.client.postForm(path, { json: JSON.stringify(credentialPayload(credential)) });
    return credential.id;
  }

  async deleteCredential(store: CredentialStore, id: string, domain?: string): Promise<string> {
    await this.client.post(`${credentialDomainPath(store, domain)}/credential/${encodeURIComponent(id)}/doDelete`);
    return id;
  }
}
