import type { RiskKind, Severity } from "./types.js";

export type RuleDef = {
  kind: RiskKind;
  severity: Severity;
  title: string;
  detects: string;
  remedy: string;
};

export const RULES: readonly RuleDef[] = [
  {
    kind: "EmbeddedJavaScript",
    severity: "High",
    title: "Embedded JavaScript",
    detects: "Action dictionaries with /S /JavaScript, or any dictionary carrying a /JS entry.",
    remedy: "The action dictionary is emptied and a script stream it references is replaced by an empty stream."
  },
  {
    kind: "LaunchAction",
    severity: "High",
    title: "Launch action",
    detects: "Action dictionaries with /S /Launch, which ask the viewer to start an external program or open a file.",
    remedy: "The action dictionary is emptied."
  },
  {
    kind: "EmbeddedFile",
    severity: "Medium",
    title: "Embedded file",
    detects: "Streams with /Type /EmbeddedFile (attachments).",
    remedy: "The stream is replaced by a zero-length placeholder."
  },
  {
    kind: "AutoAction",
    severity: "Medium",
    title: "Automatic action",
    detects: "/OpenAction entries that resolve to an action other than plain navigation, and /AA trigger dictionaries.",
    remedy: "The /OpenAction or /AA entry is removed from the dictionary that holds it."
  },
  {
    kind: "SuspiciousStream",
    severity: "Low",
    title: "Suspicious stream",
    detects:
      "Streams whose filter chain cannot be validated or does not decode, or whose decoded data looks like an executable.",
    remedy: "The stream data is dropped; the stream dictionary is kept without its filter entries."
  },
  {
    kind: "Other",
    severity: "Low",
    title: "Other active content",
    detects: "SubmitForm, ImportData, GoToR, GoToE and RichMediaExecute actions, and XFA form definitions.",
    remedy: "The action dictionary is emptied and /XFA entries are removed."
  }
];

export const SEVERITY_BY_KIND: Readonly<Record<RiskKind, Severity>> = {
  EmbeddedJavaScript: "High",
  LaunchAction: "High",
  EmbeddedFile: "Medium",
  AutoAction: "Medium",
  SuspiciousStream: "Low",
  Other: "Low"
};
