'use strict';

import * as util from 'util';
import * as _ from 'lodash';
import type PDAConfiguration from './PDAConfiguration';

export interface ErrorDetails {
  problemValue?: unknown;
  validationErrors?: string[];
}

function formatMessage (reason: string, details: ErrorDetails): string {
  const problemValue = _.has(details, 'problemValue')
    ? ': ' + util.inspect(details.problemValue, { breakLength: Infinity })
    : '';
  const validationErrors = _.isEmpty(details.validationErrors)
    ? ''
    : '\n' + _.map(details.validationErrors, (error) => '  - ' + error).join('\n');
  return reason + problemValue + validationErrors;
}

export class AutomatonError extends Error {
  public readonly reason: string;
  public readonly details: ErrorDetails;

  constructor (reason: string, details: ErrorDetails = {}) {
    super(formatMessage(reason, details));

    this.name = 'AutomatonError';

    this.reason = reason;
    this.details = details;

    // https://github.com/Microsoft/TypeScript-wiki/blob/master/Breaking-Changes.md#extending-built-ins-like-error-array-and-map-may-no-longer-work
    // Set the prototype explicitly.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** An automaton definition (or the environment configuration) is malformed. */
export class AutomatonSpecError extends AutomatonError {
  constructor (reason: string, details?: ErrorDetails) {
    super(reason, details);
    this.name = 'AutomatonSpecError';
  }
}

export class InvalidStateError extends AutomatonError {
  constructor (reason: string, details?: ErrorDetails) {
    super(reason, details);
    this.name = 'InvalidStateError';
  }
}

export class InvalidSymbolError extends AutomatonError {
  constructor (reason: string, details?: ErrorDetails) {
    super(reason, details);
    this.name = 'InvalidSymbolError';
  }
}

export class NondeterminismError extends AutomatonError {
  constructor (reason: string, details?: ErrorDetails) {
    super(reason, details);
    this.name = 'NondeterminismError';
  }
}

/** Thrown when a run halts without accepting. */
export class RejectionError extends AutomatonError {
  public readonly configuration: PDAConfiguration;

  constructor (reason: string, configuration: PDAConfiguration) {
    super(reason, { problemValue: configuration });
    this.name = 'RejectionError';
    this.configuration = configuration;
  }
}
