import { z } from 'zod';

const text = z.string().catch('');
const optionalText = z.string().optional().catch(undefined);

/**
 * Inbound Kakao skill payload. Every field is optional and malformed values
 * degrade to empty/absent rather than failing validation.
 */
export const SkillRequest = z
  .object({
    userRequest: z
      .object({
        utterance: text.default(''),
        callbackUrl: optionalText,
        user: z
          .object({ id: text.default('') })
          .passthrough()
          .catch({ id: '' })
          .default({ id: '' }),
      })
      .passthrough()
      .catch({ utterance: '', user: { id: '' } })
      .default({ utterance: '', user: { id: '' } }),
  })
  .passthrough()
  .catch({ userRequest: { utterance: '', user: { id: '' } } });

export interface SkillInput {
  utterance: string;
  userId: string;
  callbackUrl?: string;
}

/** Extracts utterance, user id and callback URL from any request body. */
export function parseSkillRequest(body: unknown): SkillInput {
  const parsed = SkillRequest.parse(body ?? {});
  const { utterance, user, callbackUrl } = parsed.userRequest;
  const url = callbackUrl?.trim();
  return {
    utterance: utterance.trim(),
    userId: user.id.trim(),
    ...(url ? { callbackUrl: url } : {}),
  };
}

export const WebLinkButton = z.object({
  action: z.literal('webLink'),
  label: z.string(),
  webLinkUrl: z.string().url(),
});

export const BasicCard = z.object({
  title: z.string(),
  description: z.string(),
  buttons: z.array(WebLinkButton),
  thumbnail: z.object({ imageUrl: z.string().url() }).optional(),
});

export const Output = z.union([
  z.object({ simpleText: z.object({ text: z.string() }) }),
  z.object({ basicCard: BasicCard }),
  z.object({ carousel: z.object({ type: z.literal('basicCard'), items: z.array(BasicCard) }) }),
]);

export const TemplateResponse = z.object({
  version: z.literal('2.0'),
  template: z.object({ outputs: z.array(Output).min(1) }),
});

export const CallbackAckResponse = z.object({
  version: z.literal('2.0'),
  useCallback: z.literal(true),
  data: z.object({ text: z.string() }),
});

export const SkillResponse = z.union([TemplateResponse, CallbackAckResponse]);

export type WebLinkButtonT = z.infer<typeof WebLinkButton>;
export type BasicCardT = z.infer<typeof BasicCard>;
export type OutputT = z.infer<typeof Output>;
export type TemplateResponseT = z.infer<typeof TemplateResponse>;
export type CallbackAckResponseT = z.infer<typeof CallbackAckResponse>;
export type SkillResponseT = z.infer<typeof SkillResponse>;
