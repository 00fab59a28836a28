export { BASIC_TABLE_PATTERNS } from "./basic.js";
export { EXTENDED_TABLE_PATTERNS } from "./extended.js";
export {
	countMatches,
	createPatternLibrary,
	matchesAny,
	toGlobal,
	type PatternLibrary,
	type SectionPatterns,
	type TablePatterns,
} from "./library.js";
export { INCORPORATION_TARGETS, PAGE_RANGE } from "./sections.js";
