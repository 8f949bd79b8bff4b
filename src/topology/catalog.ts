/**
 * Static capability tables.
 *
 * Which component models exist, how many dataplane ports each brings and at
 * which sites it may be requested; which images exist and their login user.
 * This is client-side request validation only, not live capacity.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { ComponentType } from '../domain/topology';

export interface ComponentModelSpec {
  type: ComponentType;
  ports: number;
  bandwidthGbps: number;
  /** Shared (virtual-function) NICs cannot terminate point-to-point circuits. */
  shared?: boolean;
  /** Sites offering the model. Absent means every site. */
  sites?: string[];
}

export interface ImageSpec {
  username: string;
}

export interface CapabilityCatalog {
  models: Record<string, ComponentModelSpec>;
  images: Record<string, ImageSpec>;
}

const COMPONENT_TYPES: ReadonlySet<string> = new Set(['SharedNIC', 'SmartNIC', 'GPU', 'NVME', 'FPGA', 'Storage']);

export function isComponentType(value: unknown): value is ComponentType {
  return typeof value === 'string' && COMPONENT_TYPES.has(value);
}

const DATA_DIR = join(__dirname, '..', '..', 'data');

let defaultCatalog: CapabilityCatalog | undefined;

/** The catalog shipped in data/, loaded once. */
export function getDefaultCatalog(): CapabilityCatalog {
  if (!defaultCatalog) {
    defaultCatalog = {
      models: parseModels(readJson(join(DATA_DIR, 'component-models.json'))),
      images: parseImages(readJson(join(DATA_DIR, 'images.json'))),
    };
  }
  return defaultCatalog;
}

/** Models that may be requested at a site. */
export function modelsAvailableAt(catalog: CapabilityCatalog, site: string): string[] {
  return Object.entries(catalog.models)
    .filter(([, spec]) => !spec.sites || spec.sites.includes(site))
    .map(([model]) => model)
    .sort();
}

export function parseModels(raw: unknown): Record<string, ComponentModelSpec> {
  const models: Record<string, ComponentModelSpec> = {};
  for (const [model, value] of Object.entries(asRecord(raw, 'component models'))) {
    const spec = asRecord(value, `model ${model}`);
    const type = spec.type;
    if (!isComponentType(type)) {
      throw new Error(`Component model ${model} has an unknown type: ${String(type)}`);
    }
    models[model] = {
      type,
      ports: asNumber(spec.ports, `${model}.ports`),
      bandwidthGbps: asNumber(spec.bandwidthGbps, `${model}.bandwidthGbps`),
      shared: spec.shared === true,
      sites: Array.isArray(spec.sites) ? spec.sites.map(String) : undefined,
    };
  }
  return models;
}

export function parseImages(raw: unknown): Record<string, ImageSpec> {
  const images: Record<string, ImageSpec> = {};
  for (const [image, value] of Object.entries(asRecord(raw, 'images'))) {
    const username = asRecord(value, `image ${image}`).username;
    if (typeof username !== 'string' || username.length === 0) {
      throw new Error(`Image ${image} has no username`);
    }
    images[image] = { username };
  }
  return images;
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

function asRecord(value: unknown, what: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Expected an object for ${what}`);
  }
  return Object.fromEntries(Object.entries(value));
}

function asNumber(value: unknown, what: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new Error(`Expected a non-negative number for ${what}`);
  }
  return value;
}
