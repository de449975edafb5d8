/**
 * Path construction for Jenkins items.
 *
 * Jobs and folders live under nested `/job/<name>` segments; each segment is
 * URL-encoded to handle special characters.
 *
 * @module refs
 */

/**
 * Converts a folder chain to its API path.
 *
 * @example
 * folderPath(['team', 'backend']); // Returns '/job/team/job/backend'
 * folderPath([]); // Returns ''
 */
export function folderPath(folders: readonly string[]): string {
  return folders.map((segment) => `/job/${encodeURIComponent(segment)}`).join('');
}

/**
 * Path of a job (or folder) nested under `parents`.
 *
 * @example
 * jobPath('api', ['team']); // Returns '/job/team/job/api'
 */
export function jobPath(name: string, parents: readonly string[] = []): string {
  return folderPath([...parents, name]);
}

/**
 * Path of a numbered build of a job.
 *
 * @example
 * buildPath('api', 42); // Returns '/job/api/42'
 */
export function buildPath(jobName: string, number: number, parents: readonly string[] = []): string {
  return `${jobPath(jobName, parents)}/${number}`;
}

/**
 * Extracts the queue item id from a build trigger `Location` header.
 *
 * @example
 * queueIdFromLocation('https://ci.example.com/queue/item/17/'); // Returns 17
 */
export function queueIdFromLocation(location: string): number | null {
  const match = /\/queue\/item\/(\d+)\/?/.exec(location);
  return match ? parseInt(match[1], 10) : null;
}
