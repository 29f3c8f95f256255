/**
 * Lightweight CSV parser for quoted-field CSVs (RFC 4180 style).
 * Handles CRLF, embedded newlines in quoted fields, and escaped quotes.
 * Returns raw rows; the first row is the header when the file has one.
 */
export function parseCSVRows(raw: string): string[][] {
  const text = raw.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  let i = 0;

  const endField = () => {
    row.push(quoted ? field : field.trim());
    field = "";
    quoted = false;
  };
  const endRow = () => {
    endField();
    if (row.some((cell) => cell !== "")) rows.push(row);
    row = [];
  };

  while (i < text.length) {
    const ch = text[i];

    if (ch === '"' && field.trim() === "" && !quoted) {
      // Quoted field: consume until the closing quote
      field = "";
      quoted = true;
      i++;
      while (i < text.length) {
        if (text[i] === '"' && text[i + 1] === '"') {
          field += '"';
          i += 2;
        } else if (text[i] === '"') {
          i++;
          break;
        } else {
          field += text[i];
          i++;
        }
      }
      // Anything between the closing quote and the delimiter is dropped
      while (i < text.length && text[i] !== "," && text[i] !== "\n") i++;
    } else if (ch === ",") {
      endField();
      i++;
    } else if (ch === "\n") {
      endRow();
      i++;
    } else {
      field += ch;
      i++;
    }
  }

  if (field !== "" || quoted || row.length > 0) endRow();
  return rows;
}
