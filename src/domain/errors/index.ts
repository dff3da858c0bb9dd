// Base class for domain errors - code lets callers branch without instanceof chains
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// requested reservation exceeds what the catalog still has
export class InventoryError extends DomainError {
  constructor(
    public readonly productId: string,
    public readonly productName: string,
    public readonly available: number,
    public readonly requested: number
  ) {
    super(
      `Insufficient stock for ${productName}. Available: ${available}`,
      'INSUFFICIENT_STOCK'
    );
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
  }
}
