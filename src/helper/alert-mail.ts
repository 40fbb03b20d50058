import type { DetectionEvent } from "../shared/interfaces";

const BREVO_ENDPOINT = "https://api.brevo.com/v3/smtp/email";

export interface AlertMailInput {
  apiKey: string;
  senderEmail: string;
  recipient: { email: string; name: string | null };
  videoName: string;
  videoId: string;
  alerts: DetectionEvent[];
}

/** `m:ss.s`, rounded to the tenth before splitting so 59.96 s reads 1:00.0. */
export function formatTimestamp(seconds: number): string {
  const tenths = Math.round(seconds * 10);
  const minutes = Math.floor(tenths / 600);
  const rest = ((tenths % 600) / 10).toFixed(1).padStart(4, "0");
  return `${minutes}:${rest}`;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function buildAlertMail(input: AlertMailInput) {
  const { recipient, videoName, videoId, alerts } = input;
  const greeting = recipient.name || "there";
  const subject = `🚨 ${alerts.length} alert${alerts.length === 1 ? "" : "s"} in "${videoName}"`;

  const lines = alerts.map(
    (alert) =>
      `• ${formatTimestamp(alert.timestampSeconds)}  ${alert.eventType}  (score ${alert.anomalyScore.toFixed(2)})`
  );

  const textContent = `
Hi ${greeting}!

Analysis of "${videoName}" finished with ${alerts.length} high-score detection(s).

🎥 ALERTS
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
${lines.join("\n")}

📊 VIDEO ID
${videoId}
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

Review the events in your dashboard and mark false positives to tune the detector.
  `.trim();

  const rows = alerts
    .map(
      (alert) => `
        <tr>
          <td style="padding: 8px 0; color: #666;">${formatTimestamp(alert.timestampSeconds)}</td>
          <td style="padding: 8px 0; color: #333;"><strong>${escapeHtml(alert.eventType)}</strong></td>
          <td style="padding: 8px 0; color: #dc3545;">${alert.anomalyScore.toFixed(2)}</td>
        </tr>`
    )
    .join("");

  const htmlContent = `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
</head>
<body style="font-family: Arial, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px;">
  <div style="background: linear-gradient(135deg, #dc3545, #a71d2a); padding: 30px; text-align: center; border-radius: 10px 10px 0 0;">
    <h1 style="color: white; margin: 0; font-size: 24px;">🚨 Surveillance Alert</h1>
  </div>
  <div style="background: #f9f9f9; padding: 30px; border-radius: 0 0 10px 10px;">
    <p style="font-size: 16px;">Hi ${escapeHtml(greeting)}!</p>
    <p style="font-size: 16px;">Analysis of <strong>${escapeHtml(videoName)}</strong> finished with ${alerts.length} high-score detection(s).</p>
    <div style="background: white; padding: 20px; border-radius: 8px; border-left: 4px solid #dc3545;">
      <table style="width: 100%; border-collapse: collapse;">${rows}
      </table>
    </div>
    <p style="margin-top: 20px; color: #666; font-size: 14px;">Video ID: <code>${videoId}</code></p>
  </div>
</body>
</html>
  `.trim();

  return { subject, textContent, htmlContent };
}

export async function sendAlertMail(input: AlertMailInput): Promise<void> {
  const { subject, textContent, htmlContent } = buildAlertMail(input);

  const response = await fetch(BREVO_ENDPOINT, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "api-key": input.apiKey,
    },
    body: JSON.stringify({
      sender: { name: "Sentinel Surveillance", email: input.senderEmail },
      to: [{ email: input.recipient.email, name: input.recipient.name ?? undefined }],
      subject,
      textContent,
      htmlContent,
    }),
  });

  if (!response.ok) {
    const errorData: unknown = await response.json().catch(() => null);
    const detail =
      typeof errorData === "object" && errorData !== null && "message" in errorData
        ? String(errorData.message)
        : response.statusText;
    throw new Error(`Failed to send email: ${detail}`);
  }
}
