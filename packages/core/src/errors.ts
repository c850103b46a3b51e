/**
 * Error types raised by the gate compiler and circuit container.
 *
 * Every failure is thrown synchronously from the call that caused it, and a
 * failed call never leaves a circuit half-modified.
 */

/**
 * Base class for all compiler errors
 */
export class OpticsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OpticsError';
  }
}

/**
 * Gate name is not one of Rx, Ry, CNOT
 */
export class UnsupportedGateError extends OpticsError {
  readonly gate: string;

  constructor(gate: string, message: string = `Unsupported gate: ${gate}`) {
    super(message);
    this.name = 'UnsupportedGateError';
    this.gate = gate;
  }
}

/**
 * CNOT whose control and target both sit in the polarization degree of freedom
 */
export class UnsupportedCnotError extends UnsupportedGateError {
  readonly control: number;
  readonly target: number;

  constructor(control: number, target: number) {
    super('CNOT', `Unsupported CNOT configuration: control ${control}, target ${target}`);
    this.name = 'UnsupportedCnotError';
    this.control = control;
    this.target = target;
  }
}

export class InvalidEncodingError extends OpticsError {
  readonly encoding: string;

  constructor(encoding: string) {
    super(`Invalid encoding: ${encoding} (expected pol_path or path_only)`);
    this.name = 'InvalidEncodingError';
    this.encoding = encoding;
  }
}

/**
 * Composition of circuits built for different register sizes
 */
export class IncompatibleCircuitsError extends OpticsError {
  readonly left: number;
  readonly right: number;

  constructor(left: number, right: number) {
    super(`Cannot compose a ${left}-qubit circuit with a ${right}-qubit circuit`);
    this.name = 'IncompatibleCircuitsError';
    this.left = left;
    this.right = right;
  }
}

/**
 * Qubit operand outside [1, N], a missing CNOT target, or control === target
 */
export class OperandOutOfRangeError extends OpticsError {
  readonly operand: number | undefined;
  readonly numQubits: number;

  constructor(operand: number | undefined, numQubits: number, message?: string) {
    super(message ?? `Qubit ${operand} out of range [1, ${numQubits}]`);
    this.name = 'OperandOutOfRangeError';
    this.operand = operand;
    this.numQubits = numQubits;
  }
}
