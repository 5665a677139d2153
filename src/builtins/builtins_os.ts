/**
 * Purpose: Provide the ThemeScript `os` subset: clock, date, time, difftime.
 * Intent: Read time only through the injected clock so builds can be made reproducible.
 */

import { floatToInteger } from "../themescript/numbers.js";
import { type ScriptValue, ScriptTable } from "../themescript/values.js";
import { argAt, argNumber, argTable, makeLibrary, optString } from "./builtins_shared.js";

const DAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

interface DateFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  min: number;
  sec: number;
  wday: number;
  yday: number;
}

function dateFields(d: Date, utc: boolean): DateFields {
  const year = utc ? d.getUTCFullYear() : d.getFullYear();
  const month = (utc ? d.getUTCMonth() : d.getMonth()) + 1;
  const day = utc ? d.getUTCDate() : d.getDate();
  const startOfYear = Date.UTC(year, 0, 1);
  const yday = Math.round((Date.UTC(year, month - 1, day) - startOfYear) / 86_400_000) + 1;
  return {
    year,
    month,
    day,
    hour: utc ? d.getUTCHours() : d.getHours(),
    min: utc ? d.getUTCMinutes() : d.getMinutes(),
    sec: utc ? d.getUTCSeconds() : d.getSeconds(),
    wday: (utc ? d.getUTCDay() : d.getDay()) + 1,
    yday,
  };
}

function two(n: number): string {
  return String(n).padStart(2, "0");
}

function nameAt(names: string[], index: number): string {
  return names[index] ?? "?";
}

function strftime(format: string, f: DateFields): string {
  let out = "";
  for (let i = 0; i < format.length; i++) {
    const ch = format.charAt(i);
    if (ch !== "%") {
      out += ch;
      continue;
    }
    const spec = format.charAt(++i);
    switch (spec) {
      case "Y":
        out += String(f.year);
        break;
      case "y":
        out += two(f.year % 100);
        break;
      case "m":
        out += two(f.month);
        break;
      case "d":
        out += two(f.day);
        break;
      case "H":
        out += two(f.hour);
        break;
      case "M":
        out += two(f.min);
        break;
      case "S":
        out += two(f.sec);
        break;
      case "p":
        out += f.hour < 12 ? "AM" : "PM";
        break;
      case "A":
        out += nameAt(DAY_NAMES, f.wday - 1);
        break;
      case "a":
        out += nameAt(DAY_NAMES, f.wday - 1).slice(0, 3);
        break;
      case "B":
        out += nameAt(MONTH_NAMES, f.month - 1);
        break;
      case "b":
        out += nameAt(MONTH_NAMES, f.month - 1).slice(0, 3);
        break;
      case "j":
        out += String(f.yday).padStart(3, "0");
        break;
      case "c":
        out += strftime("%a %b ", f) + String(f.day).padStart(2, " ") + strftime(" %H:%M:%S %Y", f);
        break;
      case "x":
        out += strftime("%m/%d/%y", f);
        break;
      case "X":
        out += strftime("%H:%M:%S", f);
        break;
      case "%":
        out += "%";
        break;
      default:
        throw new Error(`bad argument #1 to 'date' (invalid conversion specifier '%${spec}')`);
    }
  }
  return out;
}

function fieldsToTable(f: DateFields): ScriptTable {
  const t = new ScriptTable();
  for (const [key, value] of Object.entries(f)) t.rawSet(key, BigInt(value));
  t.rawSet("isdst", false);
  return t;
}

function tableField(t: ScriptTable, key: string, fallback: number | null): number {
  const v = t.get(key);
  const n = typeof v === "number" ? floatToInteger(v) : typeof v === "bigint" ? v : null;
  if (n !== null) return Number(n);
  if (v === null && fallback !== null) return fallback;
  throw new Error(`field '${key}' missing in date table`);
}

export function makeOsLibrary(getNow: () => Date): ScriptTable {
  const started = performance.now();

  return makeLibrary("os", {
    clock: () => (performance.now() - started) / 1000,
    time: (args) => {
      if (argAt(args, 0) === null) return BigInt(Math.floor(getNow().getTime() / 1000));
      const t = argTable(args, 0, "time");
      const local = new Date(
        tableField(t, "year", null),
        tableField(t, "month", null) - 1,
        tableField(t, "day", null),
        tableField(t, "hour", 12),
        tableField(t, "min", 0),
        tableField(t, "sec", 0)
      );
      if (Number.isNaN(local.getTime())) throw new Error("time result cannot be represented in this installation");
      return BigInt(Math.floor(local.getTime() / 1000));
    },
    difftime: (args) => argNumber(args, 0, "difftime") - (argAt(args, 1) === null ? 0 : argNumber(args, 1, "difftime")),
    date: (args: ScriptValue[]) => {
      let format = optString(args, 0, "date", "%c");
      const when = argAt(args, 1) === null ? getNow() : new Date(argNumber(args, 1, "date") * 1000);
      const utc = format.startsWith("!");
      if (utc) format = format.slice(1);
      const fields = dateFields(when, utc);
      return format.startsWith("*t") ? fieldsToTable(fields) : strftime(format, fields);
    },
  });
}
