// Protocol specification table
//
// Immutable index of message definitions by DGN. Shared by the decoder and
// the command encoder without synchronization.

import type { MessageDefinition } from '@rvlink/protocol';
import { dgnBase, formatDgn, validateSpecification } from '@rvlink/protocol';
import { ConfigurationError } from '../errors.js';
import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';

export class SpecificationTable {
  private byDgn = new Map<number, MessageDefinition>();
  private byName = new Map<string, MessageDefinition>();

  /**
   * @throws ConfigurationError if two definitions share a DGN or a name
   */
  constructor(messages: readonly MessageDefinition[]) {
    const issues: string[] = [];
    for (const message of messages) {
      if (this.byDgn.has(message.dgn)) {
        issues.push(`DGN ${formatDgn(message.dgn)} is defined more than once`);
        continue;
      }
      if (this.byName.has(message.name)) {
        issues.push(`Message name ${message.name} is used more than once`);
        continue;
      }
      this.byDgn.set(message.dgn, message);
      this.byName.set(message.name, message);
    }
    if (issues.length > 0) {
      throw new ConfigurationError('Invalid specification table', issues);
    }
  }

  /**
   * Validate a parsed specification document and build the table.
   *
   * @throws ConfigurationError listing every problem found
   */
  static fromDocument(document: unknown, logger: Logger = silentLogger): SpecificationTable {
    const result = validateSpecification(document);
    for (const warning of result.warnings) {
      logger.warn(warning.message, { path: warning.path });
    }
    if (!result.valid) {
      throw new ConfigurationError(
        'Invalid specification',
        result.errors.map((error) => `${error.path}: ${error.message}`)
      );
    }
    return new SpecificationTable(result.value);
  }

  /**
   * Exact lookup by DGN.
   */
  get(dgn: number): MessageDefinition | undefined {
    return this.byDgn.get(dgn);
  }

  /**
   * Lookup for a DGN taken from the bus. PDU1 DGNs carry a destination
   * address in their low byte, so they fall back to the definition with
   * that byte cleared.
   */
  lookup(dgn: number): MessageDefinition | undefined {
    return this.byDgn.get(dgn) ?? this.byDgn.get(dgnBase(dgn));
  }

  getByName(name: string): MessageDefinition | undefined {
    return this.byName.get(name);
  }

  has(dgn: number): boolean {
    return this.byDgn.has(dgn);
  }

  list(): MessageDefinition[] {
    return Array.from(this.byDgn.values());
  }

  get size(): number {
    return this.byDgn.size;
  }
}
