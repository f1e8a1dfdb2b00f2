import type { ApiErrorDetail } from '../error/apiError.js';
import { FieldDescriptor } from '../schema/field.js';
import { StructuredObject, buildKindSchema } from '../schema/structured.js';

/** One entry of the `errors` collection of a failed response. */
export class ApiErrorRecord extends StructuredObject implements ApiErrorDetail {
  static readonly schema = buildKindSchema({
    kind: 'ApiErrorRecord',
    fields: {
      code: FieldDescriptor.of(),
      detailedCode: FieldDescriptor.of(),
      hint: FieldDescriptor.of(),
      properties: new FieldDescriptor({ singular: 'property' }),
      referenceCode: FieldDescriptor.of('reference'),
      resourceUrl: FieldDescriptor.of('url'),
      text: FieldDescriptor.of(),
    },
  });

  get code(): string | undefined {
    return this.readString('code');
  }

  get text(): string | undefined {
    return this.readString('text');
  }

  get hint(): string | undefined {
    return this.readString('hint');
  }
}
