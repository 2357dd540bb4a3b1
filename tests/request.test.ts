/**
 * Letter request form validation.
 */

import { describe, it, expect } from "vitest";

import { toLetterRequest, type LetterRequestInput } from "../src/schemas/tool-schemas";
import { parseLetterType } from "../src/constants/letter-types";
import { InvalidLetterRequestError } from "../src/utils/errors";

const BASE: LetterRequestInput = {
  letter_type: "Denial",
  company_name: "Acme Mutual",
  insured_name: "Jane Doe",
  policy_number: "P-1002",
  claim_number: "C-5531",
  response_deadline_days: 30,
};

describe("parseLetterType", () => {
  it("maps enum values, labels and aliases", () => {
    expect(parseLetterType("CoverageDecision")).toBe("CoverageDecision");
    expect(parseLetterType("Coverage Decision")).toBe("CoverageDecision");
    expect(parseLetterType("Denial Letter")).toBe("Denial");
    expect(parseLetterType("rfi")).toBe("RequestForInfo");
    expect(parseLetterType("Request for Additional Information")).toBe("RequestForInfo");
  });

  it("returns null for unknown or blank names", () => {
    expect(parseLetterType("Subrogation")).toBeNull();
    expect(parseLetterType("  ")).toBeNull();
  });
});

describe("toLetterRequest", () => {
  it("builds a frozen request from form input", () => {
    const request = toLetterRequest({ ...BASE, contact_phone: " 1-800-555-0100 " });
    expect(request).toEqual({
      letterType: "Denial",
      companyName: "Acme Mutual",
      insuredName: "Jane Doe",
      policyNumber: "P-1002",
      claimNumber: "C-5531",
      contactPhone: "1-800-555-0100",
      responseDeadlineDays: 30,
      notes: undefined,
    });
    expect(Object.isFrozen(request)).toBe(true);
  });

  it("treats blank optional fields as absent", () => {
    const request = toLetterRequest({ ...BASE, contact_phone: "   ", notes: "" });
    expect(request.contactPhone).toBeUndefined();
    expect(request.notes).toBeUndefined();
  });

  it("defaults the response deadline to 30 days", () => {
    const { response_deadline_days: _omitted, ...withoutDeadline } = BASE;
    expect(toLetterRequest(withoutDeadline).responseDeadlineDays).toBe(30);
  });

  it("accepts a zero-day deadline", () => {
    const request = toLetterRequest({ ...BASE, letter_type: "RequestForInfo", response_deadline_days: 0 });
    expect(request.responseDeadlineDays).toBe(0);
    expect(request.letterType).toBe("RequestForInfo");
  });

  it.each([-1, 91, 2.5])("rejects a deadline of %s days", (days) => {
    expect(() => toLetterRequest({ ...BASE, response_deadline_days: days })).toThrow(
      InvalidLetterRequestError
    );
  });

  it("rejects an unsupported letter type with a field-level issue", () => {
    try {
      toLetterRequest({ ...BASE, letter_type: "Subrogation" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidLetterRequestError);
      expect(err).toMatchObject({ code: "INVALID_REQUEST" });
      expect(err instanceof InvalidLetterRequestError && err.issues[0]).toMatch(
        /^letter_type: Unsupported letter type "Subrogation"/
      );
    }
  });

  it("rejects blank required identifiers", () => {
    expect(() => toLetterRequest({ ...BASE, company_name: "   " })).toThrow(InvalidLetterRequestError);
    expect(() => toLetterRequest({ ...BASE, claim_number: "" })).toThrow(InvalidLetterRequestError);
  });
});
