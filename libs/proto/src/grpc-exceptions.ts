/**
 * Custom gRPC exception classes.
 *
 * These wrap RpcException with proper gRPC status codes so that both
 * server and client share the same error contract.
 *
 * @see https://grpc.github.io/grpc/core/md_doc_statuscodes.html
 */
import { HttpException, HttpStatus } from '@nestjs/common';
import { RpcException } from '@nestjs/microservices';
import { status as GrpcStatus } from '@grpc/grpc-js';

export class GrpcNotFoundException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.NOT_FOUND,
      message,
    });
  }
}

export class GrpcInvalidArgumentException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.INVALID_ARGUMENT,
      message,
    });
  }
}

export class GrpcInternalException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.INTERNAL,
      message,
    });
  }
}

export class GrpcAlreadyExistsException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.ALREADY_EXISTS,
      message,
    });
  }
}

export class GrpcFailedPreconditionException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.FAILED_PRECONDITION,
      message,
    });
  }
}

export class GrpcUnavailableException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.UNAVAILABLE,
      message,
    });
  }
}

/**
 * Maps an error escaping a service call onto the gRPC error contract.
 *
 * Nest HTTP exceptions carry the domain meaning (404 → NOT_FOUND,
 * 409 → ALREADY_EXISTS or FAILED_PRECONDITION, 400 → INVALID_ARGUMENT).
 * A 409 is a precondition failure unless the exception's `reason` says it
 * is a duplicate.
 */
export function toRpcException(error: unknown): RpcException {
  if (error instanceof RpcException) return error;

  if (error instanceof HttpException) {
    const message = error.message;
    switch (error.getStatus()) {
      case HttpStatus.NOT_FOUND:
        return new GrpcNotFoundException(message);
      case HttpStatus.BAD_REQUEST:
        return new GrpcInvalidArgumentException(message);
      case HttpStatus.CONFLICT:
        return conflictReason(error) === 'duplicate'
          ? new GrpcAlreadyExistsException(message)
          : new GrpcFailedPreconditionException(message);
      case HttpStatus.SERVICE_UNAVAILABLE:
        return new GrpcUnavailableException(message);
    }
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  return new GrpcInternalException(message);
}

function conflictReason(error: HttpException): string | null {
  const response = error.getResponse();
  if (
    typeof response === 'object' &&
    response !== null &&
    'reason' in response
  ) {
    return typeof response.reason === 'string' ? response.reason : null;
  }
  return null;
}
