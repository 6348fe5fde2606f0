import { Request, Response, NextFunction } from 'express';
import { currentUserId } from '@/middleware/auth';
import { uploadedImagePath } from '@/middleware/upload';
import type { CommunityService } from '@/services/community.service';
import { createSuccessResponse, type ApiResponse } from '@/types/api.types';
import type { CheckNameBody, CreateCommunityBody } from '@/utils/validation';

export class CommunityController {
  constructor(private readonly communityService: CommunityService) {}

  async createCommunity(req: Request, res: Response, next: NextFunction) {
    try {
      const body: CreateCommunityBody = req.body;

      const community = await this.communityService.createCommunity(currentUserId(req), {
        name: body.name,
        type: body.type,
        title: body.title,
        color: body.color,
        categoryNames: body.categories,
        description: body.description,
        rules: body.rules,
        userAdjective: body.user_adjective,
        usersAdjective: body.users_adjective,
        avatar: uploadedImagePath(req, 'avatar'),
        cover: uploadedImagePath(req, 'cover')
      });

      res.status(201).json(createSuccessResponse(community));
    } catch (error) {
      next(error);
    }
  }

  async checkName(req: Request, res: Response, next: NextFunction) {
    try {
      const { name }: CheckNameBody = req.body;

      await this.communityService.assertNameAvailable(name);

      res.status(202).json({ success: true, message: 'Community name available' } satisfies ApiResponse);
    } catch (error) {
      next(error);
    }
  }

  async getCommunity(req: Request, res: Response, next: NextFunction) {
    try {
      const community = await this.communityService.getCommunity(req.params.name);
      res.json(createSuccessResponse(community));
    } catch (error) {
      next(error);
    }
  }

  async getJoinedCommunities(req: Request, res: Response, next: NextFunction) {
    try {
      const communities = await this.communityService.getJoinedCommunities(currentUserId(req));
      res.json(createSuccessResponse(communities));
    } catch (error) {
      next(error);
    }
  }

  async getFavoriteCommunities(req: Request, res: Response, next: NextFunction) {
    try {
      const communities = await this.communityService.getFavoriteCommunities(currentUserId(req));
      res.json(createSuccessResponse(communities));
    } catch (error) {
      next(error);
    }
  }

  async joinCommunity(req: Request, res: Response, next: NextFunction) {
    try {
      const community = await this.communityService.joinCommunity(currentUserId(req), req.params.name);
      res.status(201).json(createSuccessResponse(community));
    } catch (error) {
      next(error);
    }
  }

  async leaveCommunity(req: Request, res: Response, next: NextFunction) {
    try {
      const community = await this.communityService.leaveCommunity(currentUserId(req), req.params.name);
      res.json(createSuccessResponse(community));
    } catch (error) {
      next(error);
    }
  }

  async favoriteCommunity(req: Request, res: Response, next: NextFunction) {
    try {
      const community = await this.communityService.favoriteCommunity(currentUserId(req), req.params.name);
      res.json(createSuccessResponse(community));
    } catch (error) {
      next(error);
    }
  }

  async unfavoriteCommunity(req: Request, res: Response, next: NextFunction) {
    try {
      const community = await this.communityService.unfavoriteCommunity(currentUserId(req), req.params.name);
      res.json(createSuccessResponse(community));
    } catch (error) {
      next(error);
    }
  }
}
