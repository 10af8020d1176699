import { Injectable, NotFoundException, ConflictException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { User, UserRole } from '../entities/user.entity';
import { AuditService } from '../audit/audit.service';
import { CartService } from '../cart/cart.service';
import { CartSessionStore } from '../cart/cart-session.store';

export interface CreateUserOptions {
  role?: UserRole;
  isActive?: boolean;
}

@Injectable()
export class UsersService {
  constructor(
    @InjectRepository(User)
    private userRepository: Repository<User>,
    private auditService: AuditService,
    private configService: ConfigService,
    private cartService: CartService,
    private cartSessions: CartSessionStore,
  ) {}

  async findAll(): Promise<User[]> {
    return this.userRepository.find({ order: { createdAt: 'DESC' } });
  }

  async findOne(id: string): Promise<User> {
    const user = await this.userRepository.findOne({ where: { id } });

    if (!user) {
      throw new NotFoundException('Utilisateur non trouvé');
    }

    return user;
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { username } });
  }

  // Un compte client est inactif jusqu'à son activation par un administrateur
  async create(username: string, password: string, options: CreateUserOptions = {}): Promise<User> {
    const existing = await this.findByUsername(username);
    if (existing) {
      throw new ConflictException('Ce nom d\'utilisateur existe déjà. Il doit être unique.');
    }

    const rounds = parseInt(this.configService.get<string>('BCRYPT_ROUNDS') || '10', 10);
    const user = this.userRepository.create({
      username,
      passwordHash: await bcrypt.hash(password, rounds),
      role: options.role ?? UserRole.CLIENT,
      isActive: options.isActive ?? false,
    });

    return this.userRepository.save(user);
  }

  // Un compte suspendu ne peut plus vider son panier : le stock réservé est restitué ici
  async setActive(id: string, isActive: boolean, currentUserId: string): Promise<User> {
    const user = await this.findOne(id);
    user.isActive = isActive;
    const savedUser = await this.userRepository.save(user);

    if (!isActive) {
      await this.cartService.clearCart(this.cartSessions.get(id));
      this.cartSessions.discard(id);
    }

    await this.auditService.log(currentUserId, isActive ? 'ACTIVATE_USER' : 'SUSPEND_USER', 'User', id, {
      username: user.username,
    });

    return savedUser;
  }

  async touchLastLogin(user: User): Promise<void> {
    user.lastLoginAt = new Date();
    await this.userRepository.update({ id: user.id }, { lastLoginAt: user.lastLoginAt });
  }
}
