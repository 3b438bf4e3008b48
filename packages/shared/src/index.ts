// Export Enums
export * from './enums';

// Export DTOs
export * from './dto/task.dto';
export * from './dto/system.dto';
export * from './dto/error.dto';
