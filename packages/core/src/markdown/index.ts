export { SECTION_BREAK, headerLevel, patchSection, getSection, replaceBetweenMarkers } from './markdown_section';
export {
  RELEASER_START,
  RELEASER_END,
  getReleaserSection,
  patchReleaserSection,
} from './releaser_section';
