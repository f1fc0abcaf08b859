// functions/src/scripts/seedTutors.ts
// Upserts the tutor accounts from data/tutors.json into users/{id}.
// Emulator: FIRESTORE_EMULATOR_HOST=127.0.0.1:8080 npm run seed:tutors

import fs from "fs";
import path from "path";

import { getApps, initializeApp } from "firebase-admin/app";
import { FieldValue, getFirestore } from "firebase-admin/firestore";

import { buildTutorUserDocs, parseTutorSeeds, tutorSeedWrite } from "../core/tutors/seed";

const DATA_FILE = path.join(__dirname, "..", "..", "data", "tutors.json");

async function main() {
  const parsed = parseTutorSeeds(JSON.parse(fs.readFileSync(DATA_FILE, "utf8")));
  if (!parsed.ok) throw new Error(`${DATA_FILE}: ${parsed.error}`);

  if (!getApps().length) initializeApp();
  const db = getFirestore();
  const batch = db.batch();

  const docs = buildTutorUserDocs(parsed.value).map(({ id, doc }) => ({ ref: db.collection("users").doc(id), doc }));
  const snapshots = docs.length ? await db.getAll(...docs.map(({ ref }) => ref)) : [];

  docs.forEach(({ ref, doc }, i) => {
    const exists = snapshots[i]?.exists ?? false;
    batch.set(ref, tutorSeedWrite(doc, exists, FieldValue.serverTimestamp()), { merge: true });
  });

  await batch.commit();
  console.log(`seeded ${parsed.value.length} tutors`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
