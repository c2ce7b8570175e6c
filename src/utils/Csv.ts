const NEWLINE = "\n";
const SPECIAL_CHARS_REGEX = /[",\r\n]/;

export type CsvRow = Record<string, string>;

const quoteValue = (value: string): string => {
  if (value === "") {
    return "";
  }

  return SPECIAL_CHARS_REGEX.test(value)
    ? `"${value.replace(/"/g, '""')}"`
    : value;
};

const sanitizeBOM = (input: string): string =>
  input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;

export const renderCsv = (columns: string[], rows: CsvRow[]): string => {
  const lines: string[] = [columns.map(quoteValue).join(",")];

  for (const row of rows) {
    lines.push(columns.map((column) => quoteValue(row[column] ?? "")).join(","));
  }

  return `${lines.join(NEWLINE)}${NEWLINE}`;
};

/** RFC 4180 style parsing: quoted fields may hold commas, quotes and newlines */
export const parseCsvRows = (input: string): string[][] => {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  const pushField = () => {
    row.push(field);
    field = "";
  };
  const pushRow = () => {
    // Skip rows that are entirely empty
    if (row.some((value) => value.trim().length > 0)) {
      rows.push(row);
    }
    row = [];
  };

  const data = sanitizeBOM(input);

  for (let i = 0; i < data.length; i += 1) {
    const char = data[i];
    if (inQuotes) {
      if (char === '"') {
        if (data[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      continue;
    }

    if (char === ",") {
      pushField();
      continue;
    }

    if (char === "\r" || char === "\n") {
      pushField();
      pushRow();
      if (char === "\r" && data[i + 1] === "\n") {
        i += 1;
      }
      continue;
    }

    field += char;
  }

  if (inQuotes) {
    throw new Error("Unterminated quoted field at end of input");
  }

  if (field.length > 0 || row.length > 0) {
    pushField();
    pushRow();
  }

  return rows;
};

/** Maps every data row onto the header row's column names */
export const parseCsv = (input: string): { columns: string[]; rows: CsvRow[] } => {
  const [header, ...body] = parseCsvRows(input);
  if (!header) {
    return { columns: [], rows: [] };
  }

  const columns = header.map((column) => column.trim());
  const rows = body.map((values) => {
    const row: CsvRow = {};
    columns.forEach((column, index) => {
      row[column] = values[index] ?? "";
    });
    return row;
  });

  return { columns, rows };
};
