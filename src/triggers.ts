import {
  buildBucketId,
  buildSharedBucketId,
  extractEnvironment,
  extractProjectName,
  sharedTopicId,
  sourceTopicId,
} from "./naming.js";
import { publishBatch, type PublishOptions, type PublishSummary } from "./publisher.js";

/**
 * Republish every file under `prefix` in the team's source bucket so the
 * kildomaten service for `sourceName` processes them again.
 *
 * @param projectId the team's standard project, which also owns the topic
 * @param kuben false for teams still on the legacy project layout, whose ids
 *   carry no environment marker
 */
export async function triggerSourceDataProcessing(
  projectId: string,
  sourceName: string,
  prefix: string,
  kuben = true,
  options?: PublishOptions
): Promise<PublishSummary> {
  const projectName = extractProjectName(projectId);
  const env = kuben ? extractEnvironment(projectId) : undefined;
  const bucketId = buildBucketId(projectName, env, kuben);

  return publishBatch({ projectId, bucketId, prefix, topicId: sourceTopicId(sourceName) }, options);
}

/**
 * Same as {@link triggerSourceDataProcessing} for delomaten: files come from the
 * product bucket and `sourceName` is the folder holding the delomaten config.
 */
export async function triggerSharedDataProcessing(
  projectId: string,
  sourceName: string,
  prefix: string,
  options?: PublishOptions
): Promise<PublishSummary> {
  const projectName = extractProjectName(projectId);
  const env = extractEnvironment(projectId);
  const bucketId = buildSharedBucketId(projectName, env);

  return publishBatch({ projectId, bucketId, prefix, topicId: sharedTopicId(sourceName) }, options);
}
