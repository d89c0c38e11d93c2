/**
 * Voice represents a synthetic voice profile hosted by the voice API.
 */
export interface Voice {
    /** Opaque identifier assigned by the API (e.g. "21m00Tcm4TlvDq8ikWAM") */
    readonly voiceId: string;
    /** Human-readable name, not guaranteed unique */
    readonly name: string;
    /** Classification such as "premade" or "cloned" */
    readonly category?: string;
    /** Extra metadata, e.g. { accent: "american" } */
    readonly labels?: Readonly<Record<string, string>>;
}

/**
 * Creates a frozen Voice.
 */
export function createVoice(params: {
    voiceId: string;
    name: string;
    category?: string;
    labels?: Record<string, string>;
}): Voice {
    return Object.freeze({
        voiceId: params.voiceId,
        name: params.name,
        category: params.category,
        labels: params.labels ? Object.freeze({ ...params.labels }) : undefined,
    });
}

/**
 * One-line label used by the CLI: "Rachel (21m00...) [premade]".
 */
export function formatVoice(voice: Voice): string {
    const base = `${voice.name} (${voice.voiceId})`;
    return voice.category ? `${base} [${voice.category}]` : base;
}
