import { BadRequestException, HttpStatus, PipeTransform } from "@nestjs/common";
import type { z } from "zod";
import type { FieldError, ValidationProblemDetails } from "../errors/problem-details.interface";

const ROOT_FIELD_ERROR = "_root";

export function mapZodIssuesToFieldErrors(
  issues: Array<{ path: PropertyKey[]; code?: string; message: string }>,
): FieldError[] {
  return issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.map(String).join(".") : ROOT_FIELD_ERROR,
    code: issue.code,
    message: issue.message,
  }));
}

export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: z.ZodType<T>) {}

  transform(value: unknown): T {
    const result = this.schema.safeParse(value);

    if (!result.success) {
      const errors = mapZodIssuesToFieldErrors(result.error.issues);

      const problem: ValidationProblemDetails = {
        type: "VALIDATION_ERROR",
        title: "Validation Failed",
        status: HttpStatus.BAD_REQUEST,
        detail: "One or more validation errors occurred",
        errors,
      };
      throw new BadRequestException(problem);
    }

    return result.data;
  }
}
