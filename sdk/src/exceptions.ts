export class ResolverError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResolverError";
  }
}

export class ResolverAPIError extends ResolverError {
  statusCode: number;
  constructor(statusCode: number, message: string) {
    super(`Resolver API error (${statusCode}): ${message}`);
    this.name = "ResolverAPIError";
    this.statusCode = statusCode;
  }
}

export class InvalidReferenceError extends ResolverError {
  reference: string;
  constructor(reference: string, reason: string) {
    super(`Invalid reference "${reference}": ${reason}`);
    this.name = "InvalidReferenceError";
    this.reference = reference;
  }
}
