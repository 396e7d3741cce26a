/**
 * Panel Components Index
 */

export { BOMPanel } from "./BOMPanel";
export { KiCadPanel } from "./KiCadPanel";
