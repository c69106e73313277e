// HTTP contract of POST /analyze

import request from "supertest";
import { describe, it, expect } from "vitest";
import { createApp } from "@/app";
import { buildWorkbookFromRows, careRow, operationalRow } from "./workbook.fixtures";

const app = createApp({ corsOrigin: "*", uploadLimitBytes: 5 * 1024 * 1024 });

describe("POST /analyze", () => {
  it("returns operational and care records for an uploaded workbook", async () => {
    const buffer = buildWorkbookFromRows([
      operationalRow({ Flock: "F1", Date: "2024-01-01" }),
      operationalRow({ Flock: "F1", Date: "2024-01-01" }),
      careRow({ Vaccination: null }),
    ]);

    const res = await request(app)
      .post("/analyze")
      .attach("file", buffer, "records.xlsx");

    expect(res.status).toBe(200);
    expect(Object.keys(res.body)).toEqual(["operational_data", "care_data"]);
    expect(res.body.operational_data).toHaveLength(2);
    expect(res.body.operational_data[0]["Duplicate Error"]).toBe(true);
    expect(res.body.operational_data[0]["Error Details"]).toBe("Duplicate Flock/Date");
    expect(res.body.care_data).toHaveLength(1);
    expect(res.body.care_data[0].note).toBe(
      "Note: Only medication recorded, no vaccination data entered.",
    );
    expect(res.body.care_data[0].has_error).toBe(false);
  });

  it("accepts upper-case extensions", async () => {
    const res = await request(app)
      .post("/analyze")
      .attach("file", buildWorkbookFromRows([careRow()]), "RECORDS.XLSX");

    expect(res.status).toBe(200);
    expect(res.body.care_data).toHaveLength(1);
  });

  it("rejects non-Excel uploads", async () => {
    const res = await request(app)
      .post("/analyze")
      .attach("file", Buffer.from("Flock,Date\nF1,2024-01-01\n"), "records.csv");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      ok: false,
      error: "Only Excel files allowed.",
      code: "UNSUPPORTED_FILE_TYPE",
    });
  });

  it("rejects text uploaded under an .xlsx name", async () => {
    const res = await request(app)
      .post("/analyze")
      .attach(
        "file",
        Buffer.from("this is not a spreadsheet at all\nFlock,Date\nF1,2024-01-01\n"),
        "records.xlsx",
      );

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      ok: false,
      error: "Failed to read Excel file: not an .xls or .xlsx workbook",
      code: "WORKBOOK_UNREADABLE",
    });
  });

  it("rejects arbitrary bytes uploaded under an .xls name", async () => {
    const junk = Buffer.alloc(200, 0x41);

    const res = await request(app).post("/analyze").attach("file", junk, "records.xls");

    expect(res.status).toBe(400);
    expect(res.body.code).toBe("WORKBOOK_UNREADABLE");
  });

  it("requires a file", async () => {
    const res = await request(app).post("/analyze").send({});

    expect(res.status).toBe(422);
    expect(res.body.code).toBe("FILE_REQUIRED");
  });

  it("rejects files in an unexpected field", async () => {
    const res = await request(app)
      .post("/analyze")
      .attach("upload", buildWorkbookFromRows([careRow()]), "records.xlsx");

    expect(res.status).toBe(400);
    expect(res.body.code).toBe("UPLOAD_REJECTED");
  });

  it("enforces the upload size limit", async () => {
    const small = createApp({ corsOrigin: "*", uploadLimitBytes: 16 });

    const res = await request(small)
      .post("/analyze")
      .attach("file", Buffer.alloc(64, 1), "records.xlsx");

    expect(res.status).toBe(413);
    expect(res.body).toEqual({
      ok: false,
      error: "Uploaded file exceeds 16 bytes.",
      code: "FILE_TOO_LARGE",
    });
  });
});
