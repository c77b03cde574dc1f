/***
 * Primitive errors: Validation and assertion failure errors.
 *
 * Separate from SlotMapError so the primitives below do not depend
 * on the container's error taxonomy.
 *
 ***/

import { AppError } from "utils/error";

export enum TYPE_ERROR {
  VALIDATION_FAIL_CONDITION = "VALIDATION_FAIL_CONDITION",
}

export class PrimitiveTypeError extends AppError {
  constructor(
    public readonly category: TYPE_ERROR,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, false, context);
  }
}
