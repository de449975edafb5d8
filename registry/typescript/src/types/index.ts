/**
 * Data model for registry operations.
 * @module types
 */

/**
 * Registry artifact identity.
 *
 * An image whose `digest` is non-empty is already resolved; digest lookups
 * return it without touching the network.
 */
export interface Image {
  /** Registry host, e.g. "docker.io" or "harbor.example.com:8443". */
  domain: string;
  /** Repository path, e.g. "library/alpine". */
  path: string;
  /** Tag, defaults to "latest". */
  tag: string;
  /** Config digest, e.g. "sha256:...". */
  digest?: string;
}

/**
 * Bearer challenge parsed from a `WWW-Authenticate` header.
 */
export interface AuthChallenge {
  realm: URL;
  service: string;
  scope: string[];
}

/**
 * Opaque bearer token. The empty string means no auth is required.
 */
export type Token = string;

/**
 * Content descriptor inside a schema2 manifest.
 */
export interface Descriptor {
  mediaType: string;
  size: number;
  digest: string;
}

/**
 * Docker image manifest, schema version 2.
 */
export interface ImageManifest {
  schemaVersion: number;
  mediaType: string;
  config: Descriptor;
  layers: Descriptor[];
}

/**
 * Container run configuration embedded in an image config blob.
 */
export interface ContainerConfig {
  Hostname?: string;
  Domainname?: string;
  User?: string;
  AttachStdin?: boolean;
  AttachStdout?: boolean;
  AttachStderr?: boolean;
  ExposedPorts?: Record<string, unknown>;
  Tty?: boolean;
  OpenStdin?: boolean;
  StdinOnce?: boolean;
  Env?: string[];
  Cmd?: string[];
  ArgsEscaped?: boolean;
  Image?: string;
  Volumes?: unknown;
  WorkingDir?: string;
  Entrypoint?: unknown;
  OnBuild?: unknown;
  Labels?: Record<string, string> | null;
  StopSignal?: string;
}

/**
 * One entry of the image build history.
 */
export interface HistoryEntry {
  created?: string;
  created_by?: string;
  empty_layer?: boolean;
}

/**
 * Image configuration JSON as served from the config blob.
 */
export interface ImageBlob {
  architecture?: string;
  config?: ContainerConfig;
  container?: string;
  container_config?: ContainerConfig;
  created?: string;
  docker_version?: string;
  history?: HistoryEntry[];
  os?: string;
  rootfs?: {
    type?: string;
    diff_ids?: string[];
  };
}

/**
 * Outcome of an image blob lookup.
 */
export type ImageBlobStatus = 'succeeded' | 'failed';

/**
 * Result of an image blob lookup.
 */
export interface ImageBlobInfo {
  status: ImageBlobStatus;
  imageBlob?: ImageBlob;
}

/**
 * Credentials submitted for registry login verification.
 */
export interface AuthInfo {
  username: string;
  password: string;
  serverHost: string;
}

/**
 * Result of a successful login verification.
 */
export interface LoginResult {
  status: 'Login Succeeded';
}

/**
 * One registry entry of a docker config file.
 */
export interface DockerConfigEntry {
  username: string;
  password: string;
  email: string;
  serverAddress?: string;
}

/**
 * The subset of a Kubernetes Secret read by the pull-secret reader.
 * `data` values are base64 encoded, as served by the API server.
 */
export interface KubernetesSecret {
  metadata?: {
    name?: string;
    namespace?: string;
  };
  type?: string;
  data?: Record<string, string>;
}

/**
 * Input of an image blob lookup.
 */
export interface ImageNameAndSecret {
  imageName: string;
  secret: KubernetesSecret;
}
