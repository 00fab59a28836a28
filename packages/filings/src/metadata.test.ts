/**
 * Filing Metadata Tests
 */

import { describe, expect, test } from "vitest";
import { MissingMetadataError } from "./errors.js";
import { extractHeaderMetadata, padCik, parseFilenameMetadata, resolveFiling } from "./metadata.js";

const header = [
	"<SEC-HEADER>",
	"ACCESSION NUMBER:\t\t0000000000-21-000001",
	"CONFORMED SUBMISSION TYPE:\t10-K/A",
	"FILED AS OF DATE:\t\t20210315",
	"FILER:",
	"\tCOMPANY DATA:",
	"\t\tCOMPANY CONFORMED NAME:\t\t\tACME   WIDGETS INC",
	"\t\tCENTRAL INDEX KEY:\t\t\t0000012345",
	"</SEC-HEADER>",
].join("\n");

describe("parseFilenameMetadata", () => {
	test("reads date, form type, CIK and accession", () => {
		expect(parseFilenameMetadata("20210315_10-K_edgar_data_12345_0000012345-21-000001.txt")).toEqual({
			cik: "0000012345",
			formType: "10-K",
			filingDate: new Date(Date.UTC(2021, 2, 15)),
			accession: "0000012345-21-000001",
		});
	});

	test.each(["10-Q-A", "10-Q_A", "10-QA", "10-Q/A", "10-q-a"])("reads the amendment spelling %s", (form) => {
		expect(parseFilenameMetadata(`20200101_${form}_edgar_data_7_1.txt`).formType).toBe("10-Q/A");
	});

	test("leaves an impossible date out", () => {
		expect(parseFilenameMetadata("20210231_10-K_edgar_data_7_1.txt").filingDate).toBeUndefined();
	});

	test("returns nothing for other names", () => {
		expect(parseFilenameMetadata("annual-report.txt")).toEqual({});
	});
});

describe("extractHeaderMetadata", () => {
	test("reads the SGML header fields", () => {
		expect(extractHeaderMetadata(header)).toEqual({
			cik: "0000012345",
			formType: "10-K/A",
			filingDate: new Date(Date.UTC(2021, 2, 15)),
			companyName: "ACME WIDGETS INC",
		});
	});

	test("falls back to the alternative field names", () => {
		const raw = "FORM 10-Q\nC.I.K. NO. 987\nDATE OF REPORT (Date of earliest event): 2019-06-30\nREGISTRANT NAME: Small Co LLC";

		expect(extractHeaderMetadata(raw)).toEqual({
			cik: "0000000987",
			formType: "10-Q",
			filingDate: new Date(Date.UTC(2019, 5, 30)),
			companyName: "Small Co LLC",
		});
	});

	test("ignores fields past the first 5000 characters", () => {
		const raw = `${" ".repeat(5_000)}CENTRAL INDEX KEY: 42`;

		expect(extractHeaderMetadata(raw).cik).toBeUndefined();
	});

	test("rejects a company name that is too short", () => {
		expect(extractHeaderMetadata("COMPANY CONFORMED NAME: AB").companyName).toBeUndefined();
	});
});

describe("resolveFiling", () => {
	test("prefers the filename and fills the rest from the header", () => {
		const filing = resolveFiling({
			filePath: "/data/20220101_10-K_edgar_data_555_1.txt",
			fileSize: 10,
			raw: header,
		});

		expect(filing).toEqual({
			cik: "0000000555",
			companyName: "ACME WIDGETS INC",
			formType: "10-K",
			filingDate: new Date(Date.UTC(2022, 0, 1)),
			filePath: "/data/20220101_10-K_edgar_data_555_1.txt",
			fileSize: 10,
		});
	});

	test("uses the header when the filename carries nothing", () => {
		const filing = resolveFiling({ filePath: "/data/report.txt", fileSize: 1, raw: header });

		expect(filing.cik).toBe("0000012345");
		expect(filing.formType).toBe("10-K/A");
	});

	test("defaults the company name", () => {
		const filing = resolveFiling({ filePath: "20220101_10-Q_edgar_data_1_1.txt", fileSize: 1, raw: "" });

		expect(filing.companyName).toBe("Unknown Company");
	});

	test("throws when the CIK and form type cannot be found", () => {
		const resolve = () => resolveFiling({ filePath: "/data/report.txt", fileSize: 1, raw: "no header here" });

		expect(resolve).toThrow(MissingMetadataError);
		try {
			resolve();
		} catch (error) {
			expect(error).toBeInstanceOf(MissingMetadataError);
			if (error instanceof MissingMetadataError) {
				expect(error.missing).toEqual(["cik", "formType"]);
				expect(error.code).toBe("MISSING_METADATA");
				expect(error.filePath).toBe("/data/report.txt");
			}
		}
	});
});

describe("padCik", () => {
	test("pads to ten digits", () => {
		expect(padCik("320193")).toBe("0000320193");
		expect(padCik("0000320193")).toBe("0000320193");
	});
});
