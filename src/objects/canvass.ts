import { FieldDescriptor, isMapping, typeName } from '../schema/field.js';
import { type FieldInput, type KindKey, StructuredObject, buildKindSchema } from '../schema/structured.js';
import { Phone } from './contact.js';
import { sharedFields } from './registry.js';

/** When, how and by whom a person was contacted. */
export class CanvassContext extends StructuredObject {
  static readonly schema = buildKindSchema(
    {
      kind: 'CanvassContext',
      shared: ['contactTypeId', 'dateCanvassed', 'inputTypeId', 'omitActivistCodeContactHistory', 'phoneId', 'skipMatching'],
      fields: { phone: new FieldDescriptor({ kind: Phone }) },
    },
    sharedFields,
  );
}

/** One answer recorded during a canvass. `type` tells the API which kind it is. */
export class ScriptResponse extends StructuredObject {
  static readonly schema = buildKindSchema({ kind: 'ScriptResponse', shared: ['type'] }, sharedFields);

  get type(): string | undefined {
    return this.readString('type');
  }
}

/** Applies or removes an activist code. */
export class ActivistCodeResponse extends ScriptResponse {
  static readonly type = 'ActivistCode';
  static readonly schema = buildKindSchema(
    { kind: 'ActivistCodeResponse', base: ScriptResponse.schema, idField: 'id', prefix: 'activistCode', shared: ['action'] },
    sharedFields,
  );

  constructor(keyOrFields?: KindKey | FieldInput | null, fields?: FieldInput) {
    super(keyOrFields, fields);
    this.set('type', ActivistCodeResponse.type);
  }

  get action(): string | undefined {
    return this.readString('action');
  }
}

/** Records an answer to a survey question. */
export class SurveyCanvassResponse extends ScriptResponse {
  static readonly type = 'SurveyResponse';
  static readonly schema = buildKindSchema(
    {
      kind: 'SurveyCanvassResponse',
      base: ScriptResponse.schema,
      shared: ['mediumName', 'name', 'shortName', 'surveyQuestionId', 'surveyResponseId'],
    },
    sharedFields,
  );

  constructor(keyOrFields?: KindKey | FieldInput | null, fields?: FieldInput) {
    super(keyOrFields, fields);
    this.set('type', SurveyCanvassResponse.type);
  }
}

/** Builds the script response kind a mapping's `type` names. */
export function makeScriptResponse(value: unknown): ScriptResponse {
  if (!isMapping(value)) {
    throw new TypeError(`Expected a script response mapping, got ${typeName(value)}`);
  }

  const { type, ...fields } = value;
  switch (type) {
    case ActivistCodeResponse.type:
      return new ActivistCodeResponse(fields);
    case SurveyCanvassResponse.type:
      return new SurveyCanvassResponse(fields);
    default:
      throw new TypeError(`Unknown script response type ${String(type)}`);
  }
}

sharedFields.share({
  canvassContext: new FieldDescriptor({ kind: CanvassContext, aliases: ['context'] }),
  responses: new FieldDescriptor({ factory: makeScriptResponse, singular: 'response' }),
});

/** One canvass of one person: the context plus what was recorded. */
export class CanvassResponse extends StructuredObject {
  static readonly schema = buildKindSchema(
    { kind: 'CanvassResponse', shared: ['canvassContext', 'resultCodeId', 'responses'] },
    sharedFields,
  );

  get canvassContext(): CanvassContext | undefined {
    return this.readKind('canvassContext', CanvassContext);
  }

  get responses(): readonly ScriptResponse[] {
    return this.readKindList('responses', ScriptResponse) ?? [];
  }
}
