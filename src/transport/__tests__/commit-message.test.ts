import { describe, it, expect } from "vitest";

import { buildCommitMessage } from "../commit-message.js";

describe("buildCommitMessage", () => {
  it("should name the file, its source and its target", () => {
    expect(
      buildCommitMessage("Update", "data/script/run.sh", { kind: "update", sourcePath: "script/run.sh" })
    ).toBe("Update run.sh via mirrorwatch\n\nSource: script/run.sh\nTarget: data/script/run.sh");
  });

  it("should mention the date folder of a dated layout", () => {
    expect(
      buildCommitMessage("Add", "data/htdocs/index.php", {
        kind: "create",
        sourcePath: "20240115/to/usr/local/httpd/htdocs/index.php",
        batch: "20240115",
      })
    ).toBe(
      "Add index.php from 20240115 via mirrorwatch\n\n" +
        "Source: 20240115/to/usr/local/httpd/htdocs/index.php\n" +
        "Target: data/htdocs/index.php"
    );
  });

  it("should fall back to the target alone without context", () => {
    expect(buildCommitMessage("Delete", "data/htdocs/old.php")).toBe(
      "Delete old.php via mirrorwatch\n\nTarget: data/htdocs/old.php"
    );
  });
});
