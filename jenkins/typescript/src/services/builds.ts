/**
 * Jenkins Build Service
 */

import type { JenkinsClient } from '../client/index.js';
import type { Build } from '../types/resources.js';
import { buildSchema } from '../types/resources.js';
import { buildPath } from '../types/refs.js';

/**
 * Build service for reading Jenkins builds.
 */
export class BuildService {
  constructor(private readonly client: JenkinsClient) {}

  /**
   * Gets detailed information about a numbered build.
   */
  async getBuild(jobName: string, number: number, parents: string[] = []): Promise<Build> {
    return this.client.getJson(`${buildPath(jobName, number, parents)}/api/json`, buildSchema);
  }

  /**
   * True while the build is still running.
   */
  async isBuilding(jobName: string, number: number, parents: string[] = []): Promise<boolean> {
    const build = await this.getBuild(jobName, number, parents);
    return build.building;
  }
}
