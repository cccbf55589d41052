export {
  normalizeText,
  normalizeLabel,
  slugify,
  repairMojibake,
  decodeBytes,
  decodeHtmlBytes,
} from './normalize';
export { fingerprint, FINGERPRINT_PATTERN } from './fingerprint';
