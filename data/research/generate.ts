/**
 * Generate a small linked research dataset next to this script.
 * Run: npx tsx data/research/generate.ts
 * Or: tsc && node dist/data/research/generate.js
 *
 * Every foreign key resolves inside the dataset; output is deterministic.
 */
import * as path from "node:path";
import { createContext, resolveConfig } from "../../src/fixtures/config.js";
import { generateDataset, writeDataset } from "../../src/fixtures/dataset.js";
import { SEAT_HOLDING_STATUSES } from "../../src/fixtures/types.js";

const DIR = path.dirname(new URL(import.meta.url).pathname);

const ctx = createContext(42, resolveConfig({ referenceDate: "2025-09-21" }));
const data = generateDataset(ctx, {
  participants: 40,
  studies: 8,
  rooms: 12,
  researchers: 15,
  consentVersions: 20,
  sessions: 30,
  enrollments: 150,
  payments: 120,
  consents: 80,
});

console.log("Generating research data...");
for (const table of writeDataset(data, DIR)) {
  console.log(`  ${path.basename(table.target.path)}: ${table.rows} rows`);
}

const seated = data.enrollments.filter((e) => SEAT_HOLDING_STATUSES.has(e.status)).length;
const paid = data.payments.filter((p) => p.status === "paid");
const withdrawn = data.consents.filter((c) => c.withdrawnAt !== null).length;

// Print summary
console.log(`\nSummary:`);
console.log(`  Participants: ${data.participants.length}`);
console.log(`  Studies: ${data.studies.length} (${data.studies.filter((s) => s.active).length} active)`);
console.log(`  Sessions: ${data.sessions.length} across ${new Set(data.sessions.map((s) => s.room_id)).size} rooms`);
console.log(`  Enrollments: ${data.enrollments.length} (${seated} holding a seat)`);
console.log(`  Payments: ${data.payments.length} (${paid.length} paid, $${paid.reduce((s, p) => s + p.amount, 0).toLocaleString()})`);
console.log(`  Consents: ${data.consents.length} (${withdrawn} withdrawn)`);
console.log(`  Study researchers: ${data.studyResearchers.length} (avg ${(data.studyResearchers.length / Math.max(1, data.studies.length)).toFixed(1)} per study)`);
