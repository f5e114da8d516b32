import fs from "node:fs";
import path from "node:path";
import { isValidDisplayName } from "./config";
import { DCV_PORT, RDP_PORT } from "./constants";
import { CliError } from "./errors";
import type { DescriptorFormat } from "./types";

export interface ConnectionDescriptor {
  displayName: string;
  ip: string;
  username?: string;
  credential?: string;
  format?: DescriptorFormat;
}

export function descriptorPath(dir: string, displayName: string, format: DescriptorFormat = "dcv"): string {
  return path.join(dir, `${displayName}.${format}`);
}

export function displayNameFor(prefix: string, index: number): string {
  return `${prefix}-${index + 1}`;
}

/**
 * Amazon DCV connection file. Leaving out `user`/`password` makes the client prompt for them.
 */
export function renderDcvDescriptor(descriptor: ConnectionDescriptor): string {
  const lines = [
    "[version]",
    "format=1.0",
    "",
    "[connect]",
    `host=${descriptor.ip}`,
    `port=${DCV_PORT}`,
    "sessionid=console"
  ];
  if (descriptor.username) {
    lines.push(`user=${descriptor.username}`);
  }
  if (descriptor.credential) {
    lines.push(`password=${descriptor.credential}`);
  }
  lines.push("", "[options]", "fullscreen=false", "preferred-video-codec=h264");
  return `${lines.join("\n")}\n`;
}

// .rdp files only accept DPAPI-encrypted passwords, so the credential is never written here.
export function renderRdpDescriptor(descriptor: ConnectionDescriptor): string {
  const lines = [
    `full address:s:${descriptor.ip}:${RDP_PORT}`,
    "screen mode id:i:2",
    "session bpp:i:32",
    "authentication level:i:2"
  ];
  if (descriptor.username) {
    lines.push(`username:s:${descriptor.username}`);
  } else {
    lines.push("prompt for credentials:i:1");
  }
  return `${lines.join("\r\n")}\r\n`;
}

export async function writeDescriptor(dir: string, descriptor: ConnectionDescriptor): Promise<string> {
  if (!isValidDisplayName(descriptor.displayName)) {
    throw new CliError({
      kind: "validation",
      message: `Invalid connection name '${descriptor.displayName}'. Use letters, digits, '.', '_' and '-'.`
    });
  }
  if (!descriptor.ip.trim()) {
    throw new CliError({
      kind: "validation",
      message: `No IP address for '${descriptor.displayName}'.`
    });
  }

  const format = descriptor.format ?? "dcv";
  const target = descriptorPath(dir, descriptor.displayName, format);
  const content = format === "rdp" ? renderRdpDescriptor(descriptor) : renderDcvDescriptor(descriptor);

  await fs.promises.mkdir(dir, { recursive: true });
  await fs.promises.writeFile(target, content, { encoding: "utf8", mode: 0o600 });
  // `mode` only applies when the file is created.
  await fs.promises.chmod(target, 0o600);
  return target;
}
