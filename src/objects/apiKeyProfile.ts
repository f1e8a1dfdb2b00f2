import { StructuredObject, buildKindSchema } from '../schema/structured.js';
import { sharedFields } from './registry.js';

/** What the API knows about the key a client authenticates with. */
export class ApiKeyProfile extends StructuredObject {
  static readonly schema = buildKindSchema(
    {
      kind: 'ApiKeyProfile',
      shared: [
        'apiKeyTypeName',
        'committeeId',
        'committeeName',
        'databaseName',
        'hasMyCampaign',
        'hasMyVoters',
        'keyReference',
        'stateId',
        'username',
        'userFirstName',
        'userLastName',
      ],
    },
    sharedFields,
  );

  get databaseName(): string | undefined {
    return this.readString('databaseName');
  }

  get username(): string | undefined {
    return this.readString('username');
  }
}
