import { formatCsv, parseCsv } from "../csv";

describe("csv helpers", () => {
  test("formatCsv quotes special cells and blanks missing values", () => {
    const text = formatCsv(
      ["name", "value"],
      [
        ['Acme, "Inc"', 1.5],
        ["plain", null],
        ["inf", Number.POSITIVE_INFINITY],
      ]
    );
    expect(text).toBe(
      'name,value\n"Acme, ""Inc""",1.5\nplain,\ninf,\n'
    );
  });

  test("parseCsv handles quotes, CRLF and blank lines", () => {
    const rows = parseCsv('a,b\r\n"x, y","say ""hi"""\r\n\r\n1,\n');
    expect(rows).toEqual([
      ["a", "b"],
      ["x, y", 'say "hi"'],
      ["1", ""],
    ]);
  });

  test("parseCsv rejects an unterminated quote", () => {
    expect(() => parseCsv('a,"b\n')).toThrow("Unterminated quoted CSV field");
  });
});
