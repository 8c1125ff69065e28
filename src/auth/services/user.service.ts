import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { User } from '../entities/user.entity';

export interface NewUser {
  username: string;
  mobileNo: string;
  password: string;
}

/**
 * User lookups, creation and password hashing.
 */
@Injectable()
export class UserService {
  constructor(
    @InjectRepository(User)
    private userRepository: Repository<User>,
    private configService: ConfigService,
  ) {}

  async existsByMobileNo(mobileNo: string): Promise<boolean> {
    return (await this.userRepository.count({ where: { mobileNo } })) > 0;
  }

  async existsByUsername(username: string): Promise<boolean> {
    return (await this.userRepository.count({ where: { username } })) > 0;
  }

  async findById(id: string): Promise<User | null> {
    return await this.userRepository.findOne({ where: { id } });
  }

  /**
   * Login accepts either the username or the mobile number in the same field.
   */
  async findByUsernameOrMobileNo(identifier: string): Promise<User | null> {
    return await this.userRepository.findOne({
      where: [{ username: identifier }, { mobileNo: identifier }],
    });
  }

  async createUser({ username, mobileNo, password }: NewUser): Promise<User> {
    const user = this.userRepository.create({
      username,
      mobileNo,
      passwordHash: await this.hashPassword(password),
      lastLoginAt: null,
    });
    return await this.userRepository.save(user);
  }

  async verifyPassword(user: User, password: string): Promise<boolean> {
    return await bcrypt.compare(password, user.passwordHash);
  }

  async updateLastLogin(userId: string): Promise<void> {
    await this.userRepository.update(userId, { lastLoginAt: new Date() });
  }

  private async hashPassword(password: string): Promise<string> {
    const rounds = this.configService.get<number>('auth.password.bcryptRounds') ?? 12;
    return await bcrypt.hash(password, rounds);
  }
}
