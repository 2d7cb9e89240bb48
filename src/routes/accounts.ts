import { Router } from 'express'
import { endpointToArray, endpointToArrayAuth } from '@middleware/endpoint'
import { otpIpLimiter } from '@middleware/rateLimit'
import * as accountController from '@controllers/accountController'

const router = Router()

// Public endpoints
router.post('/request-otp', otpIpLimiter, ...endpointToArray(accountController.requestOtp))
router.post('/verify-otp', ...endpointToArray(accountController.verifyOtp))
router.post('/refresh-token', ...endpointToArray(accountController.refreshToken))

// Authenticated endpoints
router.get('/profile', ...endpointToArrayAuth(accountController.getProfile))
router.patch('/profile', ...endpointToArrayAuth(accountController.updateProfile))

export default router
