/**
 * Filing Filter
 *
 * Restricts a batch to chosen CIKs, form types and filing years, judged
 * from filename metadata alone so filtered files are never read. Each
 * empty list matches everything.
 */

import type { FilterSettings } from "@mdna/config";
import { type FilenameMetadata, padCik } from "./metadata.js";

export interface FilingFilter {
	/** False when every list is empty */
	readonly isActive: boolean;
	shouldProcess(metadata: FilenameMetadata): boolean;
}

export function createFilingFilter(settings: FilterSettings): FilingFilter {
	const ciks = new Set(settings.ciks.map(padCik));
	const formTypes = new Set<string>(settings.form_types);
	const years = new Set(settings.years);
	const isActive = ciks.size > 0 || formTypes.size > 0 || years.size > 0;

	return {
		isActive,
		shouldProcess(metadata) {
			if (!isActive) {
				return true;
			}
			if (ciks.size > 0 && (metadata.cik === undefined || !ciks.has(metadata.cik))) {
				return false;
			}
			if (formTypes.size > 0 && (metadata.formType === undefined || !formTypes.has(metadata.formType))) {
				return false;
			}
			if (years.size > 0) {
				const year = metadata.filingDate?.getUTCFullYear();
				if (year === undefined || !years.has(year)) {
					return false;
				}
			}
			return true;
		},
	};
}
