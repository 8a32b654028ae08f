/**
 * Simulation Module
 * Pairs a schema-driven function generator simulator with a simulated transport
 *
 * Usage:
 *   const { transport, simulator } = createSimulatedInstrument(schema);
 *
 * Configuration via environment variables:
 *   SIM_LATENCY_MS - Command latency (default: 20ms)
 *   SIM_LATENCY_JITTER_MS - Latency jitter (default: 5ms)
 */

import type { InstrumentSchema } from '../types.js';
import { createFunctionGeneratorSimulator, type FunctionGeneratorSimulator } from './function-generator-simulator.js';
import { createSimulatedTransport, type SimulatedTransport } from './simulated-transport.js';

export interface SimulatedInstrumentConfig {
  latencyMs?: number;
  latencyJitterMs?: number;
  serial?: string;
  offline?: boolean;
}

export interface SimulatedInstrument {
  transport: SimulatedTransport;
  simulator: FunctionGeneratorSimulator;
}

/**
 * Load configuration from environment variables with defaults.
 */
function loadConfigFromEnv(): SimulatedInstrumentConfig {
  const parseFloat = (envVar: string | undefined, defaultVal: number): number => {
    if (!envVar) return defaultVal;
    const parsed = Number.parseFloat(envVar);
    return Number.isNaN(parsed) ? defaultVal : parsed;
  };

  return {
    latencyMs: parseFloat(process.env.SIM_LATENCY_MS, 20),
    latencyJitterMs: parseFloat(process.env.SIM_LATENCY_JITTER_MS, 5),
  };
}

export function createSimulatedInstrument(
  schema: InstrumentSchema,
  config: SimulatedInstrumentConfig = {}
): SimulatedInstrument {
  const envConfig = loadConfigFromEnv();

  const simulator = createFunctionGeneratorSimulator(schema, { serial: config.serial });
  const transport = createSimulatedTransport(
    cmd => simulator.handleCommand(cmd),
    {
      latencyMs: config.latencyMs ?? envConfig.latencyMs,
      jitterMs: config.latencyJitterMs ?? envConfig.latencyJitterMs,
      name: `${schema.model}-sim`,
      offline: config.offline,
    }
  );

  return { transport, simulator };
}

export type { FunctionGeneratorSimulator } from './function-generator-simulator.js';
export type { SimulatedTransport } from './simulated-transport.js';
