import test from "node:test";
import assert from "node:assert/strict";
import { CliError } from "../src/lib/errors";
import { generateSecurePassword, meetsComplexity } from "../src/lib/password";

const ALLOWED = /^[A-Za-z0-9!@#$%^&*]+$/;

test("generateSecurePassword always has the requested length, alphabet and classes", () => {
  for (let trial = 0; trial < 10_000; trial += 1) {
    const password = generateSecurePassword(16);
    assert.equal(password.length, 16);
    assert.match(password, ALLOWED);
    assert.ok(meetsComplexity(password), `missing a character class: ${password}`);
  }
});

test("generateSecurePassword keeps every class at the minimum length", () => {
  for (let trial = 0; trial < 2_000; trial += 1) {
    const password = generateSecurePassword(3);
    assert.equal(password.length, 3);
    assert.match(password, /[A-Z]/);
    assert.match(password, /[a-z]/);
    assert.match(password, /[0-9]/);
  }
});

test("generateSecurePassword defaults to 16 characters", () => {
  assert.equal(generateSecurePassword().length, 16);
});

test("generateSecurePassword rejects lengths that cannot hold all classes", () => {
  for (const length of [0, 2, 4.5]) {
    assert.throws(
      () => generateSecurePassword(length),
      (error: unknown) => error instanceof CliError && error.kind === "validation"
    );
  }
});

test("meetsComplexity needs an uppercase letter, a lowercase letter and a digit", () => {
  assert.equal(meetsComplexity("Abc1"), true);
  assert.equal(meetsComplexity("abc1!"), false);
  assert.equal(meetsComplexity("ABC1"), false);
  assert.equal(meetsComplexity("Abc!"), false);
});
