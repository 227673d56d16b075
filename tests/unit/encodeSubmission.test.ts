import { encodeSubmissionBody } from "../../src/core/jobs/encodeSubmission";

describe("encodeSubmissionBody", () => {
  it("form-encodes every field once", () => {
    expect(encodeSubmissionBody({ email: "test@example.org", sequence: ">q1\nMKV", gapopen: 10, alignments: true })).toBe(
      "email=test%40example.org&sequence=%3Eq1%0AMKV&gapopen=10&alignments=true"
    );
  });

  it("appends one database= pair per list element after the other fields", () => {
    expect(
      encodeSubmissionBody({ database: ["uniprotkb_swissprot", "uniprotkb_trembl"], program: "blastp", stype: "protein" })
    ).toBe("program=blastp&stype=protein&database=uniprotkb_swissprot&database=uniprotkb_trembl");
  });

  it("treats a single database string as one pair", () => {
    expect(encodeSubmissionBody({ program: "blastn", database: "em_rel" })).toBe("program=blastn&database=em_rel");
  });

  it("joins list values of other fields into one encoded value", () => {
    expect(encodeSubmissionBody({ scores: ["50", "100"] })).toBe("scores=50%2C100");
  });

  it("produces a body with only databases when nothing else is set", () => {
    expect(encodeSubmissionBody({ database: ["pdb"] })).toBe("database=pdb");
    expect(encodeSubmissionBody({ database: [] })).toBe("");
  });
});
