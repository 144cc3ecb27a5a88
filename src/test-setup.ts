import { configureGlobal } from "fast-check";

// Fixed seed for property tests; override with TEST_SEED
const seedStr = process.env.TEST_SEED ?? "1337";
const seed = Number.isFinite(Number(seedStr)) ? Number(seedStr) : 1337;

configureGlobal({ seed, numRuns: 200 });
