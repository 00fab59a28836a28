/**
 * Line Features
 *
 * Single-line predicates shared by the classifier, the region detector and
 * table-fencing assembly. Each one reads only the line it is given.
 */

import { countMatches, matchesAny, type TablePatterns } from "../patterns/library.js";

export class LineFeatures {
	constructor(private readonly patterns: TablePatterns) {}

	isBlank(line: string): boolean {
		return line.trim().length === 0;
	}

	isDelimiter(line: string): boolean {
		return this.patterns.delimiterLine.test(line);
	}

	monetaryCount(line: string): number {
		return countMatches(line, this.patterns.monetary);
	}

	percentageCount(line: string): number {
		return countMatches(line, this.patterns.percentage);
	}

	hasMonetary(line: string): boolean {
		return this.patterns.monetary.test(line);
	}

	hasPercentage(line: string): boolean {
		return this.patterns.percentage.test(line);
	}

	/** A tab or a run of four or more spaces between cells; indentation does not count */
	hasColumnSpacing(line: string): boolean {
		const trimmed = line.trim();
		return trimmed.includes("\t") || this.patterns.wideSpacing.test(trimmed);
	}

	hasNumericColumns(line: string): boolean {
		return this.patterns.numericColumns.test(line);
	}

	hasColumnarEvidence(line: string): boolean {
		return this.hasColumnSpacing(line) || this.hasNumericColumns(line);
	}

	pipeCount(line: string): number {
		return line.split("|").length - 1;
	}

	isPipeSeparator(line: string): boolean {
		return this.patterns.pipeSeparator.test(line);
	}

	isTableHeader(line: string): boolean {
		if (matchesAny(line, this.patterns.tableHeaders) || matchesAny(line, this.patterns.multiPeriod)) {
			return true;
		}
		return this.patterns.headerKeywords.test(line) && this.hasColumnSpacing(line);
	}

	isFinancialStatementHeader(line: string): boolean {
		return matchesAny(line, this.patterns.financialStatementHeaders);
	}

	hasFinancialKeyword(line: string): boolean {
		return this.patterns.financialKeywords.test(line);
	}

	isContinuation(line: string): boolean {
		return matchesAny(line, this.patterns.continuation);
	}

	isSectionBreak(line: string): boolean {
		return matchesAny(line, this.patterns.sectionBreaks);
	}

	/** Contains a title keyword or is a capitalized phrase */
	isTitleShaped(line: string): boolean {
		return this.patterns.titleKeywords.test(line) || this.patterns.capitalizedPhrase.test(line);
	}

	hasDigit(line: string): boolean {
		return /\d/.test(line);
	}

	/** At least two cells when split on a tab or a three-space gap */
	hasColumnSegments(line: string): boolean {
		return (
			line
				.trim()
				.split(this.patterns.columnGap)
				.filter((segment) => segment.trim().length > 0).length >= 2
		);
	}

	/**
	 * A line that carries data a table region can absorb: money,
	 * percentages, negative amounts in parentheses, numeric columns,
	 * column segments or pipe cells
	 */
	isDataLine(line: string): boolean {
		return (
			this.hasMonetary(line) ||
			this.hasPercentage(line) ||
			/\(\s*\d[\d,]*(?:\.\d+)?\s*\)/.test(line) ||
			this.hasNumericColumns(line) ||
			this.hasColumnSegments(line) ||
			this.pipeCount(line) >= 2
		);
	}

	/**
	 * Prose shape: terminal punctuation or more than five words, with no
	 * column spacing and no three-space gap in front of a figure
	 */
	isSentenceLike(line: string): boolean {
		if (this.hasColumnSpacing(line) || (this.hasColumnSegments(line) && /\d/.test(line))) {
			return false;
		}
		const trimmed = line.trim();
		return /[.!?]$/.test(trimmed) || trimmed.split(/\s+/).length > 5;
	}

	/** Split a row into cells: pipes, then tabs, then column gaps, then label/value */
	splitCells(line: string): string[] {
		const trimmed = line.trim();
		if (this.pipeCount(trimmed) >= 2) {
			const cells = trimmed.split("|").map((cell) => cell.trim());
			if (cells[0] === "") {
				cells.shift();
			}
			if (cells[cells.length - 1] === "") {
				cells.pop();
			}
			return cells;
		}
		if (trimmed.includes("\t")) {
			return trimmed
				.split("\t")
				.map((cell) => cell.trim())
				.filter((cell) => cell.length > 0);
		}
		if (/\s{3,}/.test(trimmed)) {
			return trimmed
				.split(/\s{3,}/)
				.map((cell) => cell.trim())
				.filter((cell) => cell.length > 0);
		}
		const labelValue = this.patterns.labelValue.exec(trimmed);
		if (labelValue?.[1] && labelValue[2] && /[a-z]/i.test(labelValue[1])) {
			return [labelValue[1].trim(), labelValue[2].trim()];
		}
		return trimmed.length > 0 ? [trimmed] : [];
	}
}
