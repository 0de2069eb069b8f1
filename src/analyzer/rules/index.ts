// src/analyzer/rules/index.ts
import { DipChecker } from './dip-checker.js';
import type { DipCheckerOptions } from './dip-checker.js';
import { IspChecker } from './isp-checker.js';
import { LspChecker } from './lsp-checker.js';
import { OcpChecker } from './ocp-checker.js';
import type { PrincipleChecker } from './rule.js';
import { SrpChecker } from './srp-checker.js';
import type { SrpCheckerOptions } from './srp-checker.js';

export * from './rule.js';
export { DipChecker, IspChecker, LspChecker, OcpChecker, SrpChecker };
export type { DipCheckerOptions, SrpCheckerOptions };

export type CheckerOptions = SrpCheckerOptions & DipCheckerOptions;

/**
 * One checker per principle, in canonical order (SRP, OCP, LSP, ISP, DIP).
 */
export function createDefaultCheckers(options: CheckerOptions = {}): PrincipleChecker[] {
    return [
        new SrpChecker({ technicalSuffixes: options.technicalSuffixes }),
        new OcpChecker(),
        new LspChecker(),
        new IspChecker(),
        new DipChecker({ inferLayers: options.inferLayers, serviceLayerSuffixes: options.serviceLayerSuffixes }),
    ];
}
