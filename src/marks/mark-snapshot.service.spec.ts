import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { In } from 'typeorm';
import { MarkSnapshotService } from './mark-snapshot.service';
import { StudentEntity } from './entities/student.entity';
import { RawMarkEntity } from './entities/raw-mark.entity';

describe('MarkSnapshotService', () => {
  let service: MarkSnapshotService;
  const studentRepo = { find: jest.fn() };
  const markRepo = { find: jest.fn() };

  const cohort = { gradeId: 'grade-7', termId: 'term-1', assessmentType: 'End Term', educationLevel: 'junior_secondary' };

  beforeEach(async () => {
    studentRepo.find.mockReset();
    markRepo.find.mockReset();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MarkSnapshotService,
        { provide: getRepositoryToken(StudentEntity), useValue: studentRepo },
        { provide: getRepositoryToken(RawMarkEntity), useValue: markRepo },
      ],
    }).compile();

    service = module.get(MarkSnapshotService);
  });

  describe('findCohortStudents', () => {
    it('returns active students of the grade with display names', async () => {
      studentRepo.find.mockResolvedValue([
        { id: 's1', firstName: 'Amina', lastName: 'Otieno', gradeId: 'grade-7', streamId: 'east', isActive: true },
        { id: 's2', firstName: 'Brian', lastName: 'Wekesa', gradeId: 'grade-7', streamId: null, isActive: true },
      ]);

      const students = await service.findCohortStudents(cohort);

      expect(students).toEqual([
        { id: 's1', name: 'Amina Otieno', streamId: 'east' },
        { id: 's2', name: 'Brian Wekesa' },
      ]);
      expect(studentRepo.find).toHaveBeenCalledWith({
        where: { gradeId: 'grade-7', isActive: true },
        order: { lastName: 'ASC', firstName: 'ASC' },
      });
    });

    it('narrows to one stream when asked', async () => {
      studentRepo.find.mockResolvedValue([]);

      await service.findCohortStudents({ ...cohort, streamId: 'east' });

      expect(studentRepo.find).toHaveBeenCalledWith({
        where: { gradeId: 'grade-7', isActive: true, streamId: 'east' },
        order: { lastName: 'ASC', firstName: 'ASC' },
      });
    });
  });

  describe('findMarks', () => {
    it('does not query for an empty cohort', async () => {
      await expect(service.findMarks([], 'term-1', 'End Term')).resolves.toEqual([]);
      expect(markRepo.find).not.toHaveBeenCalled();
    });

    it('maps rows to raw marks keyed by component or subject', async () => {
      markRepo.find.mockResolvedValue([
        { id: 'm1', studentId: 's1', subjectId: 'math', componentId: null, component: null, rawScore: '42.50', maxRawScore: 50 },
        { id: 'm2', studentId: 's1', subjectId: null, componentId: 'grammar', component: { maxRawScore: 30 }, rawScore: '27.00', maxRawScore: null },
        { id: 'm3', studentId: 's1', subjectId: 'sci', componentId: null, component: null, rawScore: '64.00', maxRawScore: null },
      ]);

      const marks = await service.findMarks(['s1'], 'term-1', 'End Term');

      expect(marks).toEqual([
        { studentId: 's1', subjectOrComponentId: 'math', rawScore: 42.5, maxRawScore: 50 },
        { studentId: 's1', subjectOrComponentId: 'grammar', rawScore: 27, maxRawScore: 30 },
        { studentId: 's1', subjectOrComponentId: 'sci', rawScore: 64, maxRawScore: 100 },
      ]);
      expect(markRepo.find).toHaveBeenCalledWith({
        where: { studentId: In(['s1']), termId: 'term-1', assessmentType: 'End Term' },
        relations: ['component'],
      });
    });

    it('skips rows attached to neither a subject nor a component', async () => {
      markRepo.find.mockResolvedValue([
        { id: 'm9', studentId: 's1', subjectId: null, componentId: null, component: null, rawScore: '10.00', maxRawScore: 20 },
      ]);

      await expect(service.findMarks(['s1'], 'term-1', 'End Term')).resolves.toEqual([]);
    });
  });
});
