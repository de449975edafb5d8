/**
 * Jenkins Folder Service (CloudBees Folders plugin).
 */

import type { JenkinsClient } from '../client/index.js';
import type { Folder } from '../types/resources.js';
import { folderSchema } from '../types/resources.js';
import { folderPath, jobPath } from '../types/refs.js';
import { JenkinsError } from '../errors.js';

/** Item mode Jenkins uses for folders. */
export const FOLDER_MODE = 'com.cloudbees.hudson.plugins.folder.Folder';

export class FolderService {
  constructor(private readonly client: JenkinsClient) {}

  /**
   * Creates a folder, nested under `parents` when given, and returns it.
   */
  async createFolder(name: string, description = '', parents: string[] = []): Promise<Folder> {
    if (!name) {
      throw JenkinsError.missingParameter('Error creating folder, folder name is missing');
    }

    await this.client.postForm(`${folderPath(parents)}/createItem`, {
      name,
      mode: FOLDER_MODE,
      from: '',
      description,
      Submit: 'OK',
      json: JSON.stringify({ name, mode: FOLDER_MODE, from: '', description }),
    });

    return this.getFolder(name, parents);
  }

  /**
   * Gets a folder and its direct children.
   */
  async getFolder(name: string, parents: string[] = []): Promise<Folder> {
    return this.client.getJson(`${jobPath(name, parents)}/api/json`, folderSchema);
  }
}
