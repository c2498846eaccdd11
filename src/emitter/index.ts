export { emitPicture, normalizePoint, labelPayload, styledPayload, opaquePayload } from './picture-emitter.js';
export type { PictureInput } from './picture-emitter.js';
