import { describe, expect, it } from "vitest";

import { ValidationError } from "../src/errors.js";
import { classifyFilename, classifyUploads, decodeMultipartFilename } from "../src/pipeline/classifier.js";

const bytes = Buffer.from("payload");

describe("classifyFilename", () => {
  it.each([
    ["deed.jpg", "image"],
    ["deed.JPEG", "image"],
    ["scan.png", "image"],
    ["scan.bmp", "image"],
    ["scan.webp", "image"],
    ["scan.gif", "image"],
    ["registry.pdf", "pdf"],
    ["REGISTRY.PDF", "pdf"],
  ])("tags %s as %s", (filename, kind) => {
    expect(classifyFilename(filename)).toBe(kind);
  });

  it.each(["report.docx", "notes.txt", "archive.pdf.zip", "no-extension"])("rejects %s", (filename) => {
    expect(classifyFilename(filename)).toBeUndefined();
  });
});

describe("classifyUploads", () => {
  it("keeps upload order and indexes", () => {
    const documents = classifyUploads([
      { originalname: "registry.pdf", buffer: bytes },
      { originalname: "tax.png", buffer: bytes },
    ]);

    expect(documents).toEqual([
      { index: 0, filename: "registry.pdf", kind: "pdf", bytes },
      { index: 1, filename: "tax.png", kind: "image", bytes },
    ]);
  });

  it("requires at least one file", () => {
    expect(() => classifyUploads([])).toThrow(ValidationError);
    expect(() => classifyUploads([])).toThrow("at least one file required");
  });

  it("rejects a file without a name", () => {
    expect(() => classifyUploads([{ originalname: "deed.jpg", buffer: bytes }, { originalname: "  ", buffer: bytes }])).toThrow(
      "file #2 has no name",
    );
    expect(() => classifyUploads([{ buffer: bytes }])).toThrow("file #1 has no name");
  });

  it("names the unsupported file", () => {
    expect(() => classifyUploads([{ originalname: "report.docx", buffer: bytes }])).toThrow(
      "unsupported file type: report.docx. only PDF or image files (jpg, jpeg, png, bmp, webp, gif) are accepted",
    );
  });

  it("rejects the whole batch when any entry is unsupported", () => {
    expect(() =>
      classifyUploads([
        { originalname: "deed.jpg", buffer: bytes },
        { originalname: "tax.png", buffer: bytes },
        { originalname: "notes.txt", buffer: bytes },
      ]),
    ).toThrow(ValidationError);
  });
});

describe("decodeMultipartFilename", () => {
  const asParsed = (name: string) => Buffer.from(name, "utf8").toString("latin1");

  it("restores UTF-8 names read as latin1", () => {
    expect(decodeMultipartFilename(asParsed("등기부등본.pdf"))).toBe("등기부등본.pdf");
    expect(decodeMultipartFilename(asParsed("보고서.docx"))).toBe("보고서.docx");
  });

  it("leaves ASCII names alone", () => {
    expect(decodeMultipartFilename("deed.jpg")).toBe("deed.jpg");
  });

  it("leaves names that are already decoded", () => {
    expect(decodeMultipartFilename("납세증명서.png")).toBe("납세증명서.png");
  });

  it("keeps latin1 names whose bytes are not UTF-8", () => {
    expect(decodeMultipartFilename("façade.png")).toBe("façade.png");
  });
});
