import { getConfig } from "../config";
import { ConfigError } from "../engine/engine-errors";
import { simBackend } from "./sim";
import type { Backend, ContextOptions, DeviceContext } from "./types";

const backends = new Map<string, Backend>([[simBackend.name, simBackend]]);

export function getBackend(name: string): Backend | undefined {
  return backends.get(name);
}

/** Register `backend` under its name, replacing any backend of that name. */
export function registerBackend(backend: Backend): Backend {
  backends.set(backend.name, backend);
  return backend;
}

export function listBackends(): string[] {
  return Array.from(backends.keys());
}

/**
 * Open a device context on backend `name`, or on the one TABLEFLOW_BACKEND
 * selects.
 */
export function createContext(
  options?: ContextOptions,
  name: string = getConfig().backend,
): DeviceContext {
  const backend = backends.get(name);
  if (!backend) {
    throw new ConfigError(
      `Unknown backend "${name}"; registered: ${listBackends().join(", ")}`,
    );
  }
  return backend.createContext(options);
}
