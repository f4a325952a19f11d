// ──────────────────────────────────────────
// Age-gate domain: barrel export
// ──────────────────────────────────────────

export { AgeGateClassifier } from './classifier';
export { AgeGateLookup, curatedAgeGates } from './curated';
export { createAgeGateRoutes } from './routes';
