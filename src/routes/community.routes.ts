import { Router } from 'express';
import { CommunityController } from '@/controllers/community.controller';
import { communityImages, discardUploads } from '@/middleware/upload';
import { validateRequest, type RequestCheck } from '@/middleware/validateRequest';
import type { CommunityService } from '@/services/community.service';
import { communityValidation } from '@/utils/validation';

export const createCommunityRoutes = (communityService: CommunityService): Router => {
  const router = Router();
  const communityController = new CommunityController(communityService);

  const createConflicts: RequestCheck = (body, invalid) =>
    communityService.findCreateConflicts({
      name: !invalid.has('name') && typeof body.name === 'string' ? body.name : undefined,
      categoryNames:
        !invalid.has('categories') && Array.isArray(body.categories)
          ? body.categories.filter((name): name is string => typeof name === 'string')
          : undefined
    });

  router.put(
    '/communities',
    communityImages,
    validateRequest(communityValidation.createCommunity, createConflicts),
    communityController.createCommunity.bind(communityController),
    discardUploads
  );
  router.post(
    '/community-name-check',
    validateRequest(communityValidation.checkName),
    communityController.checkName.bind(communityController)
  );
  router.get('/joined-communities', communityController.getJoinedCommunities.bind(communityController));
  router.get('/favorite-communities', communityController.getFavoriteCommunities.bind(communityController));

  router.get('/communities/:name', communityController.getCommunity.bind(communityController));
  router.post('/communities/:name/members/join', communityController.joinCommunity.bind(communityController));
  router.post('/communities/:name/members/leave', communityController.leaveCommunity.bind(communityController));
  router.put('/communities/:name/favorite', communityController.favoriteCommunity.bind(communityController));
  router.delete('/communities/:name/favorite', communityController.unfavoriteCommunity.bind(communityController));

  return router;
};
