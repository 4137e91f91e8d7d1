import { BadRequestException, HttpException, HttpStatus } from '@nestjs/common';

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Rethrows any controller failure as an HttpException with a
 * `{ success: false, error }` body
 */
export function handleError(error: unknown): never {
  if (error instanceof HttpException) {
    throw error;
  }
  if (error instanceof Error && error.message.includes('must be')) {
    throw new BadRequestException({
      success: false,
      error: error.message,
    });
  }
  throw new HttpException(
    {
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    },
    HttpStatus.INTERNAL_SERVER_ERROR,
  );
}
