import { ConfigurationError } from "@csv-trim/core";
import { describe, expect, test } from "vitest";
import { type ProfileAnswers, buildStoredProfile, validateDatetimeColumn } from "../src/profile-builder";

const NO_ANSWERS: ProfileAnswers = {
  removeBlankRows: false,
  prefixes: "",
  deleteColumn: "",
  datetimeColumn: "",
  useFirstRowAsHeader: false,
};

describe("buildStoredProfile", () => {
  test("records only the header choice when nothing else is answered", () => {
    expect(buildStoredProfile(NO_ANSWERS)).toEqual({ use_first_row_as_header: false });
  });

  test("records every answered step", () => {
    expect(
      buildStoredProfile({
        removeBlankRows: true,
        prefixes: " SKIP, #,, Total ",
        deleteColumn: "2",
        datetimeColumn: "3",
        useFirstRowAsHeader: true,
      })
    ).toEqual({
      remove_blank_rows: true,
      trim_prefixes: ["SKIP", "#", "Total"],
      delete_column: "2",
      format_datetime: 2,
      use_first_row_as_header: true,
    });
  });

  test("keeps the column label as typed", () => {
    expect(buildStoredProfile({ ...NO_ANSWERS, deleteColumn: "Notes " }).delete_column).toBe("Notes ");
  });

  test("drops a prefix list of only separators", () => {
    expect(buildStoredProfile({ ...NO_ANSWERS, prefixes: " , ," })).toEqual({
      use_first_row_as_header: false,
    });
  });

  test("stores the first column as zero", () => {
    expect(buildStoredProfile({ ...NO_ANSWERS, datetimeColumn: "1" }).format_datetime).toBe(0);
  });

  test("rejects a datetime column below 1", () => {
    expect(() => buildStoredProfile({ ...NO_ANSWERS, datetimeColumn: "0" })).toThrow(ConfigurationError);
  });
});

describe("validateDatetimeColumn", () => {
  test("accepts blank and positive numbers", () => {
    expect(validateDatetimeColumn("")).toBeUndefined();
    expect(validateDatetimeColumn(" 2 ")).toBeUndefined();
  });

  test("rejects zero, negatives and text", () => {
    const message = "Enter a column number starting at 1, or leave blank";
    expect(validateDatetimeColumn("0")).toBe(message);
    expect(validateDatetimeColumn("-1")).toBe(message);
    expect(validateDatetimeColumn("date")).toBe(message);
  });
});
