/**
 * Capability catalog types
 */

export interface CapabilityDescriptor {
  id: string;
  name: string;
  description: string;
  /** Registered worker type that executes this capability */
  workerType: string;
  /** Default skill the worker should call, if any */
  skillName?: string;
  /** Documentation only; not enforced at run time */
  inputs: string[];
  outputs: string[];
}

/**
 * On-disk catalog document
 */
export interface CapabilityCatalogDocument {
  computeCapabilities: Array<Partial<CapabilityDescriptor> & { id?: unknown }>;
}
