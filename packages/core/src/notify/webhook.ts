import { errorMessage } from "../errors";

/** POSTs a JSON payload. Failures are logged and reported as `false`. */
export async function postToWebhook(url: string, payload: unknown): Promise<boolean> {
  try {
    const res = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
    });
    if (!res.ok) {
      const body = await res.text();
      console.error(`  [Slack] Webhook returned ${res.status}: ${body}`);
      return false;
    }
    return true;
  } catch (err) {
    console.error(`  [Slack] Webhook POST failed: ${errorMessage(err)}`);
    return false;
  }
}
