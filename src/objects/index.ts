/**
 * Resource kinds of the API and the registry of fields they share.
 * @module
 */
import { sharedFields } from './registry.js';

export { ActivistCode, ActivistCodeData } from './activistCode.js';
export { ApiKeyProfile } from './apiKeyProfile.js';
export {
  ActivistCodeResponse,
  CanvassContext,
  CanvassResponse,
  ScriptResponse,
  SurveyCanvassResponse,
  makeScriptResponse,
} from './canvass.js';
export { Address, Email, Phone } from './contact.js';
export { Location } from './location.js';
export { Note } from './note.js';
export { CustomFieldValue, Identifier, Person, UNMATCHED, personMatch } from './person.js';
export { sharedFields } from './registry.js';

sharedFields.freeze();
