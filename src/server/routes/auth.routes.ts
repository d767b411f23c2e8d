import { Request, Response, Router } from 'express';
import { z } from 'zod';
import { AppContext } from '../context';
import { asyncHandler, parseBody } from '../http';
import { currentUser, endSession, getSessionUser, requireLogin, startSession } from '../../auth/session';

const loginSchema = z.object({
  email: z.string().optional()
});

/**
 * Login, logout and the landing redirects
 */
export class AuthRoutes {
  constructor(private readonly context: AppContext) {}

  register(router: Router): void {
    router.get('/', this.index.bind(this));
    router.get('/login', this.loginPage.bind(this));
    router.post('/login', asyncHandler(this.login.bind(this)));
    router.get('/auth/:token', asyncHandler(this.authenticate.bind(this)));
    router.get('/logout', this.logout.bind(this));
    router.get('/dashboard', requireLogin, this.dashboard.bind(this));
  }

  private index(req: Request, res: Response): void {
    res.redirect(getSessionUser(req) ? '/dashboard' : '/login');
  }

  private loginPage(req: Request, res: Response): void {
    res.json({
      message: 'POST an email address to /login to receive a login link',
      allowedDomain: this.context.config.auth.allowedEmailDomain,
      loggedIn: getSessionUser(req) !== null
    });
  }

  private async login(req: Request, res: Response): Promise<void> {
    const { email } = parseBody(loginSchema, req, 'login');
    const result = await this.context.auth.requestLink(email);
    res.json({ success: true, email: result.email });
  }

  private async authenticate(req: Request, res: Response): Promise<void> {
    const user = await this.context.auth.authenticate(req.params.token);
    startSession(req, { userId: user.id, email: user.email });
    res.redirect('/dashboard');
  }

  private logout(req: Request, res: Response): void {
    endSession(req);
    res.redirect('/login');
  }

  private dashboard(_req: Request, res: Response): void {
    const user = currentUser(res);
    res.json({ user: { id: user.userId, email: user.email } });
  }
}
