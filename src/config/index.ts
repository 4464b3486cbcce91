import type { LogLevel } from "effect";
import { invariant } from "../internal/invariant";

export interface SparseViewConfig {
  readonly prefetch?: {
    readonly extraLoadRatio?: number;
  };
  readonly loader?: {
    readonly maxRequestsPerFill?: number;
  };
  readonly logLevel?: LogLevel.Literal;
}

export interface SparseViewResolvedConfig {
  readonly prefetch: {
    readonly extraLoadRatio: number;
  };
  readonly loader: {
    readonly maxRequestsPerFill: number;
  };
  readonly logLevel: LogLevel.Literal;
}

export const defaultConfig: SparseViewResolvedConfig = {
  prefetch: {
    extraLoadRatio: 0.5,
  },
  loader: {
    maxRequestsPerFill: 16,
  },
  logLevel: "Info",
};

export const defineConfig = (config: SparseViewConfig): SparseViewConfig => config;

export const resolveConfig = (config: SparseViewConfig = {}): SparseViewResolvedConfig => {
  const extraLoadRatio = config.prefetch?.extraLoadRatio ?? defaultConfig.prefetch.extraLoadRatio;
  const maxRequestsPerFill =
    config.loader?.maxRequestsPerFill ?? defaultConfig.loader.maxRequestsPerFill;

  invariant(
    Number.isFinite(extraLoadRatio) && extraLoadRatio >= 0,
    `prefetch.extraLoadRatio must be a finite number >= 0, received ${String(extraLoadRatio)}`,
  );
  invariant(
    Number.isInteger(maxRequestsPerFill) && maxRequestsPerFill > 0,
    `loader.maxRequestsPerFill must be a positive integer, received ${String(maxRequestsPerFill)}`,
  );

  return {
    prefetch: {
      extraLoadRatio,
    },
    loader: {
      maxRequestsPerFill,
    },
    logLevel: config.logLevel ?? defaultConfig.logLevel,
  };
};
