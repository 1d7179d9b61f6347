export type WireLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type DecodeOptions = {
    /**
     * Ownership of decoded sequences.
     * - false (default): typed arrays borrow the input buffer where alignment allows. They are
     *   only valid while the caller keeps that buffer unchanged.
     * - true: every sequence is copied into memory owned by the result.
     */
    copy?: boolean;
};

/**
 * Duplicate channel policy for analog traces.
 */
export type ChannelPolicyOptions = {
    /** Reject duplicate channel numbers instead of warning. Default false. */
    strict?: boolean;
    /** Optional logger hook; receives a warning per duplicate channel when not strict. */
    logger?: WireLogger | null;
};

export type AnalogTraceEncodeOptions = ChannelPolicyOptions;

export type AnalogTraceDecodeOptions = DecodeOptions & ChannelPolicyOptions;

export type ValidateOptions = {
    /** Report duplicate channels with `error` severity. Default false. */
    strict?: boolean;
};

export const DEFAULT_DECODE_OPTIONS: Required<DecodeOptions> = {
    copy: false,
};

export const DEFAULT_CHANNEL_POLICY: Required<ChannelPolicyOptions> = {
    strict: false,
    logger: null,
};

// Keys left undefined fall back to the defaults.
export function resolveDecodeOptions(options: DecodeOptions = {}): Required<DecodeOptions> {
    return {
        copy: options.copy ?? DEFAULT_DECODE_OPTIONS.copy,
    };
}

export function resolveChannelPolicy(options: ChannelPolicyOptions = {}): Required<ChannelPolicyOptions> {
    return {
        strict: options.strict ?? DEFAULT_CHANNEL_POLICY.strict,
        logger: options.logger ?? DEFAULT_CHANNEL_POLICY.logger,
    };
}
