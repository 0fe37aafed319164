/**
 * Topological invariants from tracked counts
 *
 * Nothing here traverses the complex: χ comes from live cell counts, and
 * components and holes are maintained by the operators.
 */

import type { Complex } from '../topo/Complex.js';

/**
 * V - E + F - C
 */
export function eulerCharacteristic<P>(complex: Complex<P>): number {
  return complex.eulerCharacteristic();
}

/**
 * Total genus: (2c - h - (V - E + F)) / 2
 */
export function computeGenus<P>(complex: Complex<P>): number {
  const surfaceChi = complex.cellCount(0) - complex.cellCount(1) + complex.cellCount(2);
  return (2 * complex.components - complex.holes - surfaceChi) / 2;
}

export interface SurfaceClassification {
  components: number;
  genus: number;
  holes: number;
  eulerCharacteristic: number;
  /** No hole loops */
  closed: boolean;
  /** e.g. `sphere`, `torus`, `genus-2 surface with 1 hole` */
  name: string;
}

function nameSurface(genus: number, holes: number): string {
  if (genus === 0 && holes === 0) return 'sphere';
  if (genus === 0 && holes === 1) return 'disk';
  if (genus === 0 && holes === 2) return 'annulus';
  if (genus === 1 && holes === 0) return 'torus';
  const base = `genus-${genus} surface`;
  if (holes === 0) return base;
  return `${base} with ${holes} ${holes === 1 ? 'hole' : 'holes'}`;
}

/**
 * Classify a complex as an orientable surface
 *
 * Only a single component gets a surface name; several components are
 * reported by count with their totals.
 */
export function classifySurface<P>(complex: Complex<P>): SurfaceClassification {
  const components = complex.components;
  const genus = computeGenus(complex);
  const holes = complex.holes;
  let name: string;
  if (components === 0) {
    name = 'empty';
  } else if (components === 1) {
    name = nameSurface(genus, holes);
  } else {
    name = `${components} components`;
  }
  return {
    components,
    genus,
    holes,
    eulerCharacteristic: complex.eulerCharacteristic(),
    closed: holes === 0,
    name,
  };
}
