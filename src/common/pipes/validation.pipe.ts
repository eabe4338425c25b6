import { BadRequestException, ValidationError, ValidationPipe } from '@nestjs/common';

/**
 * 중첩된 class-validator 에러를 `tickets.0.row` 같은 필드 경로별 메시지로 평탄화합니다.
 */
export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): Record<string, string[]> {
  const fields: Record<string, string[]> = {};

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const messages = Object.values(error.constraints ?? {});
    if (messages.length > 0) {
      fields[path] = messages;
    }
    if (error.children && error.children.length > 0) {
      Object.assign(fields, flattenValidationErrors(error.children, path));
    }
  }

  return fields;
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    whitelist: true,
    forbidNonWhitelisted: true,
    exceptionFactory: (errors) =>
      new BadRequestException({
        errorCode: 'VALIDATION_FAILED',
        message: '요청 값이 올바르지 않습니다.',
        details: { fields: flattenValidationErrors(errors) },
      }),
  });
}
