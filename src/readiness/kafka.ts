/**
 * Kafka broker readiness strategies.
 *
 * Confluent images ship the CLI tools without the `.sh` suffix and Apache
 * images with it, so each exec check tries both.
 */

import { execCheck, logPatternCheck, type ReadinessCheck } from './checks';

export interface KafkaReadinessOptions {
  /** Bootstrap server as seen from inside the broker's unit */
  bootstrapServer?: string;
  /** Log lines scanned by the startup-log check */
  tailLines?: number;
}

export const KAFKA_CHECK_NAMES = {
  brokerApiVersions: 'broker-api-versions',
  topicListing: 'topic-listing',
  startupLog: 'startup-log',
} as const;

const STARTED_LINE = /started \(kafka\.server\.Kafka(?:Server|RaftServer)\)/;
const API_VERSIONS = /ApiVersions\(\d+\)/;
const TOOL_ERROR = /exception|error/i;

function shell(tool: string, args: string): string[] {
  return ['/bin/sh', '-c', `${tool} ${args} 2>/dev/null || ${tool}.sh ${args}`];
}

export function createKafkaReadinessChecks(options: KafkaReadinessOptions = {}): ReadinessCheck[] {
  const bootstrap = options.bootstrapServer ?? 'localhost:9092';

  return [
    execCheck(
      KAFKA_CHECK_NAMES.brokerApiVersions,
      10,
      shell('kafka-broker-api-versions', `--bootstrap-server ${bootstrap}`),
      (output) => API_VERSIONS.test(output),
    ),
    execCheck(
      KAFKA_CHECK_NAMES.topicListing,
      20,
      shell('kafka-topics', `--bootstrap-server ${bootstrap} --list`),
      (output) => !TOOL_ERROR.test(output),
    ),
    logPatternCheck(KAFKA_CHECK_NAMES.startupLog, 30, STARTED_LINE, options.tailLines ?? 500),
  ];
}
