import type { FleetContext } from "../lib/command-context";
import { displayNameFor, writeDescriptor } from "../lib/descriptors";
import { describeError } from "../lib/errors";

export interface DescriptorTarget {
  /** Position in the Terraform output; drives the display name. */
  index: number;
  id: string;
  ip?: string;
  embedCredential: boolean;
}

export interface WrittenDescriptor {
  id: string;
  displayName: string;
  path: string;
  ip: string;
  withCredential: boolean;
}

/**
 * Writes one connection file per target that has an IP. A target without an IP, or whose write
 * fails, is logged and skipped so the rest still get their files.
 */
export async function writeConnectionFiles(
  context: FleetContext,
  targets: DescriptorTarget[],
  auth?: { username: string; credential: string }
): Promise<WrittenDescriptor[]> {
  const { config, logger } = context;
  const written: WrittenDescriptor[] = [];

  for (const target of targets) {
    const displayName = displayNameFor(config.namePrefix, target.index);
    if (!target.ip) {
      logger.info({ instanceId: target.id, displayName }, "no IP yet, connection file not written");
      continue;
    }

    const withCredential = target.embedCredential && auth !== undefined;
    try {
      const filePath = await writeDescriptor(config.outputDir, {
        displayName,
        ip: target.ip,
        username: withCredential ? auth?.username : undefined,
        credential: withCredential ? auth?.credential : undefined,
        format: config.descriptorFormat
      });
      written.push({ id: target.id, displayName, path: filePath, ip: target.ip, withCredential });
      logger.info({ instanceId: target.id, path: filePath, withCredential }, "connection file written");
    } catch (error) {
      logger.warn({ instanceId: target.id, displayName, error: describeError(error) }, "failed to write connection file");
    }
  }

  return written;
}
