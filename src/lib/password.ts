import { randomInt } from "node:crypto";
import { DEFAULT_PASSWORD_LENGTH, PASSWORD_SYMBOLS } from "./constants";
import { CliError } from "./errors";

const UPPERCASE = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const LOWERCASE = "abcdefghijklmnopqrstuvwxyz";
const DIGITS = "0123456789";
const ALPHABET = `${UPPERCASE}${LOWERCASE}${DIGITS}${PASSWORD_SYMBOLS}`;
const REQUIRED_CLASSES = [UPPERCASE, LOWERCASE, DIGITS] as const;

/**
 * Random administrator password with at least one uppercase letter, one lowercase letter and one
 * digit. A uniformly sampled string missing a class gets it patched in from the back, at the last
 * position whose character is not the only one of another required class, so the length never
 * changes and an earlier patch is never undone.
 */
export function generateSecurePassword(length = DEFAULT_PASSWORD_LENGTH): string {
  if (!Number.isInteger(length) || length < REQUIRED_CLASSES.length) {
    throw new CliError({
      kind: "validation",
      message: `Password length must be an integer >= ${REQUIRED_CLASSES.length}.`
    });
  }

  const chars = Array.from({ length }, () => pick(ALPHABET));

  for (const charClass of REQUIRED_CLASSES) {
    if (chars.some((char) => charClass.includes(char))) {
      continue;
    }
    chars[findPatchPosition(chars)] = pick(charClass);
  }

  return chars.join("");
}

export function meetsComplexity(password: string): boolean {
  const chars = [...password];
  return REQUIRED_CLASSES.every((charClass) => chars.some((char) => charClass.includes(char)));
}

function findPatchPosition(chars: string[]): number {
  for (let idx = chars.length - 1; idx >= 0; idx -= 1) {
    const current = chars[idx];
    const soleRepresentative = REQUIRED_CLASSES.some(
      (charClass) => charClass.includes(current)
        && !chars.some((other, otherIdx) => otherIdx !== idx && charClass.includes(other))
    );
    if (!soleRepresentative) {
      return idx;
    }
  }
  return chars.length - 1;
}

function pick(charset: string): string {
  return charset.charAt(randomInt(charset.length));
}
