export interface AlertMailContext {
    customerName: string;
    occurredAt: Date;
    ipAddress: string | null;
    device: string | null;
}

export interface RenderedMail {
    subject: string;
    text: string;
    html: string;
}

const escapeHtml = (s: string) =>
    s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");

function detailsRows(ctx: AlertMailContext): [string, string][] {
    return [
        ["Time", ctx.occurredAt.toISOString()],
        ["IP address", ctx.ipAddress ?? "unknown"],
        ["Device", ctx.device ?? "unknown"],
    ];
}

function render(subject: string, intro: string, advice: string, ctx: AlertMailContext): RenderedMail {
    const rows = detailsRows(ctx);
    const text = [
        `Hello ${ctx.customerName},`,
        "",
        intro,
        "",
        ...rows.map(([k, v]) => `${k}: ${v}`),
        "",
        advice,
    ].join("\n");

    const html = `<p>Hello ${escapeHtml(ctx.customerName)},</p>
<p>${escapeHtml(intro)}</p>
<table>${rows.map(([k, v]) => `<tr><td><strong>${escapeHtml(k)}</strong></td><td>${escapeHtml(v)}</td></tr>`).join("")}</table>
<p>${escapeHtml(advice)}</p>`;

    return { subject, text, html };
}

export function compromiseMail(reason: string, ctx: AlertMailContext): RenderedMail {
    return render(
        "Security alert: suspicious activity on your account",
        `We detected suspicious activity on your account (${reason}). All your sessions have been signed out.`,
        "If this was not you, change your password immediately.",
        ctx,
    );
}

export function newDeviceMail(ctx: AlertMailContext): RenderedMail {
    return render(
        "New sign-in to your account",
        "Your session was renewed from a device or network we have not seen before.",
        "If this was you, no action is needed. Otherwise change your password and sign out everywhere.",
        ctx,
    );
}
