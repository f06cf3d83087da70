import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@cadence/core";
import { parseCsv, parseOutletSeed, splitRegions } from "../lib/registry";

const HEADER = "outlet_id,name,homepage_url,rss_url,outlet_type,owner,counties_fips";

describe("parseCsv", () => {
  it("handles quoted commas, escaped quotes and CRLF line endings", () => {
    expect(parseCsv('a,"b, c","say ""hi"""\r\n1,2,3\r\n\r\n')).toEqual([
      ["a", "b, c", 'say "hi"'],
      ["1", "2", "3"]
    ]);
  });
});

describe("splitRegions", () => {
  it("splits on pipes and drops blanks and repeats", () => {
    expect(splitRegions(" 06001 | 06013||06001 ")).toEqual(["06001", "06013"]);
  });
});

describe("parseOutletSeed", () => {
  it("reads a CSV seed", () => {
    const csv = [
      HEADER,
      'gazette,"Valley Gazette, The",https://gazette.example/,,newspaper,Independent,06001|06013|06001',
      "radio,Radio One,https://radio.example/,/news.rss,radio,Public,"
    ].join("\n");

    expect(parseOutletSeed(csv, "csv")).toEqual([
      {
        id: "gazette",
        name: "Valley Gazette, The",
        homepageUrl: "https://gazette.example/",
        feedUrl: null,
        category: "newspaper",
        owner: "Independent",
        regionIds: ["06001", "06013"]
      },
      {
        id: "radio",
        name: "Radio One",
        homepageUrl: "https://radio.example/",
        feedUrl: "/news.rss",
        category: "radio",
        owner: "Public",
        regionIds: []
      }
    ]);
  });

  it("reads a JSON seed with region lists", () => {
    const json = JSON.stringify([
      {
        outlet_id: "letter",
        name: "Bay Letter",
        homepage_url: " ",
        counties_fips: ["06075", "06081"]
      }
    ]);

    expect(parseOutletSeed(json, "json")).toEqual([
      {
        id: "letter",
        name: "Bay Letter",
        homepageUrl: null,
        feedUrl: null,
        category: "",
        owner: "",
        regionIds: ["06075", "06081"]
      }
    ]);
  });

  it("requires every seed column in a CSV header", () => {
    const csv = "outlet_id,name,homepage_url,rss_url,outlet_type,counties_fips\nx,X,,,,";

    expect(() => parseOutletSeed(csv, "csv")).toThrow(
      new ConfigurationError("Missing column in outlet seed: owner")
    );
  });

  it("rejects repeated outlet ids", () => {
    const csv = [HEADER, "gazette,A,,,,,", "gazette,B,,,,,"].join("\n");

    expect(() => parseOutletSeed(csv, "csv")).toThrow("Duplicate outlet_id in seed: gazette");
  });

  it("rejects entries without a name", () => {
    const json = JSON.stringify([{ outlet_id: "x", name: "  " }]);

    expect(() => parseOutletSeed(json, "json")).toThrow("Invalid outlet seed at 0.name: name is required");
  });
});
