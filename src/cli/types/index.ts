/**
 * CLI-specific type definitions
 */

import type { MllpErrorKind } from '../../connectors/mllp/MllpError.js';

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * User defaults persisted by the `config` command
 */
export type CliConfig = {
  /** Default destination host */
  host?: string;
  /** Default read/write timeout in seconds */
  timeout?: number;
};

/**
 * Global CLI options available on all commands.
 * Option shapes are type aliases so commander's `opts<T>()` accepts them.
 */
export type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
};

// =============================================================================
// Command Option Types
// =============================================================================

export type SendCommandOptions = {
  host?: string;
  port: number;
  message: string;
  timeout?: number;
};

export type CheckCommandOptions = {
  host?: string;
  port: number;
  timeout?: number;
};

// =============================================================================
// Result Types
// =============================================================================

export type SendResult =
  | {
      success: true;
      host: string;
      port: number;
      /** Round trip in milliseconds */
      duration: number;
      response: string;
    }
  | {
      success: false;
      host: string;
      port: number;
      duration: number;
      error: string;
      kind?: MllpErrorKind;
    };
