/**
 * Credential types and their wire payloads for the Credentials plugin.
 * @module credentials
 */

/** Credential visibility scope. */
export type CredentialScope = 'GLOBAL' | 'SYSTEM';

interface CredentialBase {
  id: string;
  description?: string;
  /** Defaults to GLOBAL. */
  scope?: CredentialScope;
}

export interface SshCredential extends CredentialBase {
  kind: 'ssh';
  username: string;
  privateKey: string;
  passphrase?: string;
}

export interface UsernamePasswordCredential extends CredentialBase {
  kind: 'username-password';
  username: string;
  password: string;
}

export interface SecretTextCredential extends CredentialBase {
  kind: 'secret-text';
  secret: string;
}

export interface KubeconfigCredential extends CredentialBase {
  kind: 'kubeconfig';
  content: string;
}

/**
 * Any credential the client can create or update.
 */
export type Credential = SshCredential | UsernamePasswordCredential | SecretTextCredential | KubeconfigCredential;

/**
 * Where a credential is stored: the global system store or a folder's store.
 */
export type CredentialStore = { type: 'system' } | { type: 'folder'; folders: string[] };

/** Default credentials domain. */
export const DEFAULT_CREDENTIAL_DOMAIN = '_';

export const CREDENTIAL_CLASSES = {
  ssh: 'com.cloudbees.jenkins.plugins.sshcredentials.impl.BasicSSHUserPrivateKey',
  sshKeySource: 'com.cloudbees.jenkins.plugins.sshcredentials.impl.BasicSSHUserPrivateKey$DirectEntryPrivateKeySource',
  usernamePassword: 'com.cloudbees.plugins.credentials.impl.UsernamePasswordCredentialsImpl',
  secretText: 'org.jenkinsci.plugins.plaincredentials.impl.StringCredentialsImpl',
  kubeconfig: 'com.microsoft.jenkins.kubernetes.credentials.KubeconfigCredentials',
  kubeconfigSource: 'com.microsoft.jenkins.kubernetes.credentials.KubeconfigCredentials$DirectEntryKubeconfigSource',
} as const;

/**
 * Structured form submission Jenkins expects for a credential.
 */
export function credentialPayload(credential: Credential): Record<string, unknown> {
  const common = {
    scope: credential.scope ?? 'GLOBAL',
    id: credential.id,
    description: credential.description ?? '',
  };

  switch (credential.kind) {
    case 'ssh':
      return {
        ...common,
        username: credential.username,
        passphrase: credential.passphrase ?? '',
        privateKeySource: {
          'stapler-class': CREDENTIAL_CLASSES.sshKeySource,
          privateKey: credential.privateKey,
        },
        $class: CREDENTIAL_CLASSES.ssh,
      };
    case 'username-password':
      return {
        ...common,
        username: credential.username,
        password: credential.password,
        $class: CREDENTIAL_CLASSES.usernamePassword,
      };
    case 'secret-text':
      return {
        ...common,
        secret: credential.secret,
        $class: CREDENTIAL_CLASSES.secretText,
      };
    case 'kubeconfig':
      return {
        ...common,
        kubeconfigSource: {
          'stapler-class': CREDENTIAL_CLASSES.kubeconfigSource,
          content: credential.content,
        },
        $class: CREDENTIAL_CLASSES.kubeconfig,
      };
  }
}
