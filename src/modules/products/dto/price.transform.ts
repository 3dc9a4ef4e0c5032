import { TransformFnParams } from 'class-transformer';

// Multipart fields always arrive as strings.
export const toPrice = ({ value }: TransformFnParams): unknown => {
  if (value === '' || value === null || value === undefined) {
    return value;
  }
  return typeof value === 'string' || typeof value === 'number' ? Number(value) : value;
};
