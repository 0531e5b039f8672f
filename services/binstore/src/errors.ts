export class BinStoreError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ValidationError extends BinStoreError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class NotFoundError extends BinStoreError {
  constructor(message = 'Bin not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

export class IdAllocationExhaustedError extends BinStoreError {
  constructor(readonly attempts: number) {
    super(`unique id allocation exhausted after ${attempts} attempts`, 500, 'ID_ALLOCATION_EXHAUSTED');
  }
}
