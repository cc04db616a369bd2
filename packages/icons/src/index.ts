/**
 * @reposnap/icons
 *
 * Placeholder app icon generator.
 */

export {
  generateIcons,
  loadSharp,
  renderIconSvg,
  ICON_SIZES,
  ICON_STYLE,
  DEFAULT_ICON_DIR,
  type GenerateIconsOptions,
  type GeneratedIcon,
  type IconGenerationResult,
  type IconSpec,
  type SharpLoader,
  type SharpModule,
} from './icon-generator.js';

export { parseIconArgs, type ParsedIconArgs } from './args.js';
