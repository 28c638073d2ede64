import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { RegisterUserDto } from './register-user.dto';
import { collectFieldErrors } from '../../common/exceptions/validation-exception.factory';

const account = {
  username: 'newuser',
  email: 'newuser@example.com',
  firstName: 'New',
  lastName: 'User',
  password: 'test-password',
  passwordConfirm: 'test-password',
};

async function errorsFor(body: object) {
  return collectFieldErrors(await validate(plainToInstance(RegisterUserDto, body)));
}

describe('RegisterUserDto', () => {
  it('accepts a staff account without role fields', async () => {
    expect(await errorsFor({ ...account, role: 'staff' })).toEqual({});
  });

  it('requires hireDate for a teacher', async () => {
    const errors = await errorsFor({
      ...account,
      role: 'teacher',
      employeeId: 'EMP200',
      department: 'History',
      qualification: 'MA History',
    });

    expect(Object.keys(errors)).toEqual(['hireDate']);
    expect(errors.hireDate).toContain('hireDate is required for teachers');
  });

  it('ignores teacher fields for a student but requires the student ones', async () => {
    const errors = await errorsFor({ ...account, role: 'student', studentId: 'STU200' });

    expect(Object.keys(errors).sort()).toEqual(['admissionDate', 'gender', 'guardianName', 'guardianPhone', 'rollNumber']);
  });

  it('rejects a short password and an unknown role', async () => {
    const errors = await errorsFor({ ...account, password: 'short', role: 'principal' });

    expect(errors.password).toEqual(['password must be at least 8 characters long']);
    expect(errors.role).toEqual(['role must be one of admin, teacher, student, staff']);
  });
});
