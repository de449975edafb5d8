/**
 * Jenkins Job Service
 * Creating, renaming, copying, deleting and triggering jobs.
 */

import type { JenkinsClient } from '../client/index.js';
import type { Job } from '../types/resources.js';
import { jobSchema } from '../types/resources.js';
import { folderPath, jobPath, queueIdFromLocation } from '../types/refs.js';
import { JenkinsError, JenkinsErrorKind } from '../errors.js';

/**
 * Options for creating a job.
 */
export interface CreateJobOptions {
  /** Job name; required. */
  name: string;
  /** Folder chain the job is created in. */
  parents?: string[];
  /** Extra query parameters for `/createItem`. */
  parameters?: Record<string, string>;
}

/**
 * Options for triggering a build.
 */
export interface BuildJobOptions {
  /** Build parameters; when present the build goes through `/buildWithParameters`. */
  parameters?: Record<string, string>;
  /** Folder chain of the job. */
  parents?: string[];
}

/**
 * Job service for managing Jenkins jobs.
 */
export class JobService {
  constructor(private readonly client: JenkinsClient) {}

  /**
   * Creates a job from its `config.xml` and returns the created job.
   *
   * @throws {JenkinsError} MissingParameter when the name is empty
   */
  async createJob(config: string, options: CreateJobOptions): Promise<Job> {
    if (!options.name) {
      throw JenkinsError.missingParameter('Error creating job, job name is missing');
    }
    const parents = options.parents ?? [];

    await this.client.postXml(`${folderPath(parents)}/createItem`, config, {
      query: { ...options.parameters, name: options.name },
    });

    return this.getJob(options.name, parents);
  }

  /**
   * Gets detailed information about a job.
   */
  async getJob(name: string, parents: string[] = []): Promise<Job> {
    return this.client.getJson(`${jobPath(name, parents)}/api/json`, jobSchema);
  }

  /**
   * Checks if a job exists.
   */
  async jobExists(name: string, parents: string[] = []): Promise<boolean> {
    try {
      await this.getJob(name, parents);
      return true;
    } catch (error) {
      if (error instanceof JenkinsError && error.kind === JenkinsErrorKind.NotFound) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Renames a top-level job.
   */
  async renameJob(name: string, newName: string): Promise<void> {
    await this.client.post(`${jobPath(name)}/doRename`, undefined, {
      query: { newName },
    });
  }

  /**
   * Copies a top-level job under a new name. The source must exist.
   */
  async copyJob(copyFrom: string, newName: string): Promise<Job> {
    await this.getJob(copyFrom);
    await this.client.post('/createItem', undefined, {
      query: { name: newName, mode: 'copy', from: copyFrom },
    });
    return this.getJob(newName);
  }

  /**
   * Deletes a job.
   */
  async deleteJob(name: string, parents: string[] = []): Promise<boolean> {
    await this.client.post(`${jobPath(name, parents)}/doDelete`);
    return true;
  }

  /**
   * Triggers a build and returns its queue item id.
   *
   * @throws {JenkinsError} NoQueueLocation or InvalidQueueLocation when the reply has no usable `Location`
   */
  async buildJob(name: string, options: BuildJobOptions = {}): Promise<number> {
    const path = jobPath(name, options.parents);
    const parameters = options.parameters ?? {};

    const response =
      Object.keys(parameters).length > 0
        ? await this.client.postForm(`${path}/buildWithParameters`, parameters)
        : await this.client.post(`${path}/build`);

    const location = response.headers['location'];
    if (!location) {
      throw new JenkinsError(JenkinsErrorKind.NoQueueLocation, 'Build trigger response has no Location header', {
        statusCode: response.status,
        url: response.url,
      });
    }

    const queueId = queueIdFromLocation(location);
    if (queueId === null) {
      throw new JenkinsError(JenkinsErrorKind.InvalidQueueLocation, `Invalid queue location: ${location}`, {
        url: response.url,
      });
    }
    return queueId;
  }
}
