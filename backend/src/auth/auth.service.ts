import { Injectable, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { User } from '../entities/user.entity';
import { toPublicUser } from '../users/user.transform';
import { UsersService } from '../users/users.service';
import { AuditService } from '../audit/audit.service';
import { LoginDto, RegisterDto } from './dto/login.dto';
import { JwtPayload } from './jwt.strategy';

@Injectable()
export class AuthService {
  constructor(
    private usersService: UsersService,
    private auditService: AuditService,
    private jwtService: JwtService,
  ) {}

  async validateUser(username: string, password: string): Promise<User | null> {
    const user = await this.usersService.findByUsername(username);

    if (user && (await bcrypt.compare(password, user.passwordHash))) {
      return user;
    }
    return null;
  }

  async login(loginDto: LoginDto) {
    const user = await this.validateUser(loginDto.username, loginDto.password);

    if (!user) {
      throw new UnauthorizedException('Identifiant ou mot de passe incorrect');
    }

    if (!user.isActive) {
      throw new UnauthorizedException('Compte inactif : en attente d\'activation par un administrateur');
    }

    const payload: JwtPayload = {
      sub: user.id,
      username: user.username,
      role: user.role,
    };

    await this.usersService.touchLastLogin(user);
    await this.auditService.log(user.id, 'LOGIN', 'User', user.id);

    return {
      access_token: this.jwtService.sign(payload),
      user: toPublicUser(user),
    };
  }

  async register(registerDto: RegisterDto) {
    const user = await this.usersService.create(registerDto.username, registerDto.password);
    await this.auditService.log(user.id, 'REGISTER', 'User', user.id);

    return {
      message: `Compte ${user.username} créé. Il sera utilisable après activation par un administrateur.`,
      user: toPublicUser(user),
    };
  }

  async logout(userId: string) {
    await this.auditService.log(userId, 'LOGOUT', 'User', userId);
    return { message: 'Déconnexion réussie' };
  }

  async getProfile(userId: string) {
    return toPublicUser(await this.usersService.findOne(userId));
  }
}
