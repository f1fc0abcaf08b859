// functions/src/core/tutors/seed.ts
// Tutor accounts are ordinary users/{id} docs with isTutor set.

import { err, ok, type Result } from "../result";
import { asString, isRecord } from "../utils/values";

export type TutorSeed = {
  id: string;
  displayName: string;
  email: string;
  personality: string;
  primaryLanguageCode: string;
  learningLanguageCode: string;
};

export type TutorUserDoc = {
  displayName: string;
  email: string;
  isTutor: true;
  personality: string;
  primaryLanguageCode: string;
  learningLanguageCode: string;
};

const REQUIRED = [
  "id",
  "displayName",
  "email",
  "personality",
  "primaryLanguageCode",
  "learningLanguageCode",
] as const;

/** Validates the tutors.json list; the first bad entry fails the whole list. */
export function parseTutorSeeds(data: unknown): Result<TutorSeed[], string> {
  if (!Array.isArray(data)) return err("tutor list must be a JSON array");
  const list: unknown[] = data;

  const seeds: TutorSeed[] = [];
  const seen = new Set<string>();

  for (const [i, entry] of list.entries()) {
    if (!isRecord(entry)) return err(`entry ${i} is not an object`);

    const missing = REQUIRED.find((key) => !asString(entry[key]).trim());
    if (missing) return err(`entry ${i} is missing '${missing}'`);

    const id = asString(entry.id).trim();
    if (seen.has(id)) return err(`duplicate tutor id '${id}'`);
    seen.add(id);

    seeds.push({
      id,
      displayName: asString(entry.displayName).trim(),
      email: asString(entry.email).trim(),
      personality: asString(entry.personality).trim(),
      primaryLanguageCode: asString(entry.primaryLanguageCode).trim().toLowerCase(),
      learningLanguageCode: asString(entry.learningLanguageCode).trim().toLowerCase(),
    });
  }

  return ok(seeds);
}

export function buildTutorUserDocs(seeds: readonly TutorSeed[]): Array<{ id: string; doc: TutorUserDoc }> {
  return seeds.map(({ id, ...rest }) => ({
    id,
    doc: { ...rest, isTutor: true },
  }));
}

/** Fields to merge into users/{id}; createdAt is only set on first write. */
export function tutorSeedWrite<T>(
  doc: TutorUserDoc,
  exists: boolean,
  createdAt: T
): TutorUserDoc | (TutorUserDoc & { createdAt: T }) {
  return exists ? { ...doc } : { ...doc, createdAt };
}
