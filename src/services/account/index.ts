export { accountService, AccountService, ProvisionAccountRequest } from './account.service';
export { accountController, AccountController } from './account.controller';
export { accountIdParamValidation, provisionAccountValidation } from './account.validation';
export { default as accountRoutes } from './account.routes';
