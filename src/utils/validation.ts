import Joi from 'joi';
import { config, type CommunityConfig } from '@/config/config';
import { CommunityType } from '@/types/community.types';

export const COMMUNITY_NAME_PATTERN = /^[a-zA-Z0-9_]+$/;
export const HEX_COLOR_PATTERN = /^#(?:[0-9a-fA-F]{3}){1,2}$/;

export const COMMUNITY_NAME_INVALID = 'Community names can only contain alphanumeric characters and underscores.';
export const COLOR_INVALID = 'Color must be a hex color such as #1a2b3c.';

const communityName = (limits: CommunityConfig) =>
  Joi.string()
    .max(limits.nameMaxLength)
    .pattern(COMMUNITY_NAME_PATTERN)
    .messages({ 'string.pattern.base': COMMUNITY_NAME_INVALID });

const optionalText = (max: number) => Joi.string().trim().max(max).empty('').optional();

export const buildCommunityValidation = (limits: CommunityConfig) => ({
  createCommunity: Joi.object({
    name: communityName(limits).required(),
    type: Joi.string().valid(...Object.values(CommunityType)).required(),
    title: Joi.string().trim().max(limits.titleMaxLength).required(),
    color: Joi.string().pattern(HEX_COLOR_PATTERN).required().messages({ 'string.pattern.base': COLOR_INVALID }),
    // multipart bodies carry a lone category as a plain string
    categories: Joi.array()
      .items(Joi.string().trim())
      .single()
      .unique()
      .min(limits.categoriesMinAmount)
      .max(limits.categoriesMaxAmount)
      .required(),
    description: optionalText(limits.descriptionMaxLength),
    rules: optionalText(limits.rulesMaxLength),
    user_adjective: optionalText(limits.userAdjectiveMaxLength),
    users_adjective: optionalText(limits.usersAdjectiveMaxLength)
  }),

  checkName: Joi.object({
    name: communityName(limits).required()
  })
});

export const communityValidation = buildCommunityValidation(config.community);

export interface CreateCommunityBody {
  name: string;
  type: CommunityType;
  title: string;
  color: string;
  categories: string[];
  description?: string;
  rules?: string;
  user_adjective?: string;
  users_adjective?: string;
}

export interface CheckNameBody {
  name: string;
}
