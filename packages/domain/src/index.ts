// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/gps-sample.js';
export * from './entities/congestion.js';
export * from './entities/traffic-dataset.js';
export * from './entities/analysis-request.js';
export * from './errors.js';

// ─── Simulation ───────────────────────────────────────────────────────────────
export * from './simulation/route-profile.js';
export * from './simulation/route-simulator.js';
export * from './simulation/traffic-generator.js';

// ─── Analysis ─────────────────────────────────────────────────────────────────
export * from './analysis/grid-aggregator.js';
export * from './analysis/spread-classifier.js';

// ─── Wire format ──────────────────────────────────────────────────────────────
export * from './serialization/dataset-format.js';
export * from './serialization/analysis-format.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/secure-domain.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/random-source.port.js';
export * from './ports/outbound/dataset-repository.port.js';
export * from './ports/outbound/analysis-request-repository.port.js';
