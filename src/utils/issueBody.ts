import type { SourceIssue } from "../domain/models/Issue";

function cell(value: string): string {
  return value.replace(/\r?\n/g, " ").replace(/\|/g, "\\|");
}

/**
 * Markdown body for a migrated issue: the original description, then the
 * Redmine metadata table and, when present, the custom fields.
 */
export function composeIssueBody(
  issue: SourceIssue,
  redmineBaseUrl: string
): string {
  const url = `${redmineBaseUrl}/issues/${issue.id}`;
  const rows: Array<[string, string]> = [
    ["ID", `[${issue.id}](${url})`],
    ["Project", cell(issue.project.name)],
    ["Priority", cell(issue.priority)],
    ["Status", cell(issue.status)],
    ["Issue type", cell(issue.tracker)],
    ["Author", cell(issue.author.name)],
    ["Assigned to", issue.assignee ? cell(issue.assignee.name) : "-"],
    ["Category", issue.category ? cell(issue.category) : "-"],
    ["Progress", `${issue.doneRatio}%`],
    ["Created", issue.createdOn.toISOString()],
  ];

  const lines = [
    "## Description",
    issue.description.replace(/\r\n/g, "\n"),
    "",
    "## Imported from Redmine",
    "| Property | Value |",
    "| --- | --- |",
    ...rows.map(([k, v]) => `| ${k} | ${v} |`),
  ];

  if (issue.customFields.length > 0) {
    lines.push(
      "",
      "### Custom fields",
      "| Field | Value |",
      "| --- | --- |",
      ...issue.customFields.map(
        (f) => `| ${cell(f.name)} | ${cell(f.value)} |`
      )
    );
  }

  return lines.join("\n") + "\n";
}
