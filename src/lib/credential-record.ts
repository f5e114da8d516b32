import fs from "node:fs";
import path from "node:path";
import { CREDENTIAL_RECORD_FILE } from "./constants";
import type { CredentialRecord, CredentialRecordEntry, RecordedStatus } from "./types";

const STATUS_LABELS: Record<RecordedStatus, string> = {
  applied: "Password set",
  failed: "Failed",
  not_attempted: "Not attempted"
};

const RECORDED_STATUSES: RecordedStatus[] = ["applied", "failed", "not_attempted"];

const ENTRY_PATTERN = /^\s*(\d+)\.\s+(\S+)\s+\(([^)]*)\)\s+-\s+(.+?)\s*$/;

export function credentialRecordPath(dir: string): string {
  return path.join(dir, CREDENTIAL_RECORD_FILE);
}

export function renderCredentialRecord(record: CredentialRecord): string {
  const lines = [
    "Windows Administrator Password",
    "=".repeat(60),
    "",
    "IMPORTANT: Keep this file secure!",
    "",
    `Password: ${record.credential}`,
    `Generated: ${record.generatedAt.toISOString()}`,
    `Username: ${record.username}`,
    "(Same password for all instances of this batch)",
    "",
    "Instances:",
    ...record.entries.map((entry) => `  ${entry.index}. ${entry.id} (${entry.ip ?? "N/A"}) - ${STATUS_LABELS[entry.status]}`)
  ];
  return `${lines.join("\n")}\n`;
}

/** Replaces the previous record; the latest batch is the only one kept. */
export async function writeCredentialRecord(dir: string, record: CredentialRecord): Promise<string> {
  const target = credentialRecordPath(dir);
  await fs.promises.mkdir(dir, { recursive: true, mode: 0o700 });
  await fs.promises.writeFile(target, renderCredentialRecord(record), { encoding: "utf8", mode: 0o600 });
  // `mode` only applies when the file is created.
  await fs.promises.chmod(target, 0o600);
  return target;
}

export function parseCredentialRecord(text: string): CredentialRecord | undefined {
  let credential: string | undefined;
  let generatedAt: Date | undefined;
  let username: string | undefined;
  const entries: CredentialRecordEntry[] = [];

  for (const line of text.split(/\r?\n/)) {
    const value = (prefix: string) => line.slice(prefix.length).trim();
    if (line.startsWith("Password:") && credential === undefined) {
      credential = value("Password:");
    } else if (line.startsWith("Generated:")) {
      const parsed = new Date(value("Generated:"));
      generatedAt = Number.isNaN(parsed.getTime()) ? undefined : parsed;
    } else if (line.startsWith("Username:")) {
      username = value("Username:");
    } else {
      const entry = parseEntry(line);
      if (entry) {
        entries.push(entry);
      }
    }
  }

  if (!credential || !generatedAt || !username) {
    return undefined;
  }
  return { credential, generatedAt, username, entries };
}

export async function readCredentialRecord(dir: string): Promise<CredentialRecord | undefined> {
  try {
    return parseCredentialRecord(await fs.promises.readFile(credentialRecordPath(dir), "utf8"));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

function parseEntry(line: string): CredentialRecordEntry | undefined {
  const match = ENTRY_PATTERN.exec(line);
  if (!match) {
    return undefined;
  }

  const [, index, id, ip, label] = match;
  const status = RECORDED_STATUSES.find((key) => STATUS_LABELS[key] === label);
  if (!status) {
    return undefined;
  }
  return {
    index: Number(index),
    id,
    ip: ip === "N/A" ? undefined : ip,
    status
  };
}
