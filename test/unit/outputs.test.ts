import { expect } from "chai";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import {
  emitOutputs,
  formatOutputs,
  reportOutputs,
} from "../../src/core/outputs";

describe("outputs", () => {
  it("maps a report to string outputs", () => {
    expect(
      reportOutputs({
        hasChanges: true,
        baseTag: "",
        ahead: 0,
        currentBranch: "main",
      }),
    ).to.deep.equal({
      has_changes: "true",
      base_tag: "",
      ahead: "0",
      current_branch: "main",
    });
  });

  it("formats one name=value line per output", () => {
    const text = formatOutputs({ has_changes: "false", base_tag: "last-deploy" });
    expect(text).to.equal("has_changes=false\nbase_tag=last-deploy\n");
  });

  it("uses a delimiter block for values spanning lines", () => {
    const text = formatOutputs({ notes: "a\nb" }, () => "EOF");
    expect(text).to.equal("notes<<EOF\na\nb\nEOF\n");
  });

  describe("emitOutputs", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(tmpdir(), "deploy-marker-out-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("writes to stdout and appends to GITHUB_OUTPUT", () => {
      const file = path.join(dir, "output");
      writeFileSync(file, "x=1\n");
      const written: string[] = [];
      emitOutputs({ ahead: "3" }, { GITHUB_OUTPUT: file }, (t) =>
        written.push(t),
      );
      expect(written).to.deep.equal(["ahead=3\n"]);
      expect(readFileSync(file, "utf8")).to.equal("x=1\nahead=3\n");
    });

    it("only writes to stdout without GITHUB_OUTPUT", () => {
      const written: string[] = [];
      emitOutputs({ ahead: "0" }, {}, (t) => written.push(t));
      expect(written).to.deep.equal(["ahead=0\n"]);
    });
  });
});
