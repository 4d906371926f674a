import { IsInt, IsPositive } from 'class-validator';

export class AddMovieDto {
  @IsInt()
  @IsPositive()
  movieId!: number;
}
