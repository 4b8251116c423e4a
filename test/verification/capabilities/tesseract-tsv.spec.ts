import { parseTsvRegions } from "../../../src/verification/capabilities/tesseract-tsv";

const HEADER =
  "level\tpage_num\tblock_num\tpar_num\tline_num\tword_num\tleft\ttop\twidth\theight\tconf\ttext";

const SAMPLE_TSV = [
  HEADER,
  "1\t1\t0\t0\t0\t0\t0\t0\t640\t480\t-1\t",
  "4\t1\t1\t1\t1\t0\t10\t20\t100\t12\t-1\t",
  "5\t1\t1\t1\t1\t1\t10\t20\t50\t10\t96\tJane",
  "5\t1\t1\t1\t1\t2\t70\t22\t40\t10\t90\tRoe",
  "5\t1\t1\t1\t2\t1\t10\t50\t80\t12\t80\tAcme",
  "5\t1\t1\t1\t2\t2\t95\t50\t20\t12\t-1\t ",
].join("\n");

describe("parseTsvRegions", () => {
  it("groups words into line regions with averaged confidence", () => {
    const regions = parseTsvRegions(SAMPLE_TSV);

    expect(regions).toHaveLength(2);
    expect(regions[0]).toEqual({
      text: "Jane Roe",
      confidence: expect.closeTo(0.93, 10),
      boundingBox: { x0: 10, y0: 20, x1: 110, y1: 32 },
    });
    expect(regions[1]).toEqual({
      text: "Acme",
      confidence: 0.8,
      boundingBox: { x0: 10, y0: 50, x1: 90, y1: 62 },
    });
  });

  it("returns no regions for empty or header-only output", () => {
    expect(parseTsvRegions("")).toEqual([]);
    expect(parseTsvRegions(`${HEADER}\n`)).toEqual([]);
  });

  it("skips malformed rows", () => {
    expect(parseTsvRegions(`${HEADER}\n5\t1\t1`)).toEqual([]);
  });
});
