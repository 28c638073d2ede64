import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from '../user/entities/user.entity';
import { ProfileDetail, toProfileDetail } from '../user/user.mapper';
import { Caller } from '../common/access/caller';

@Injectable()
export class ProfileService {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async getProfile(caller: Caller): Promise<ProfileDetail> {
    const user = await this.userRepository.findOne({
      where: { id: caller.userId },
      relations: { profile: true },
    });
    if (!user) {
      throw new NotFoundException('User not found');
    }
    return toProfileDetail(user);
  }
}
