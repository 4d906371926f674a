import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager, In } from 'typeorm';
import { Movie } from '../entities/movie.entity';

export interface MovieDetails {
  id: number;
  title: string;
  year: number | null;
  price: string;
}

/**
 * Read access to the movie catalog. Prices returned here are the current
 * catalog prices; callers that need a fixed price must copy it.
 */
@Injectable()
export class MovieCatalogService {
  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  async getMovieById(
    movieId: number,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<MovieDetails | null> {
    const movie = await manager.getRepository(Movie).findOneBy({ id: movieId });
    return movie ? MovieCatalogService.toDetails(movie) : null;
  }

  async getMoviesByIds(
    movieIds: number[],
    manager: EntityManager = this.dataSource.manager,
  ): Promise<Map<number, MovieDetails>> {
    if (movieIds.length === 0) return new Map();

    const movies = await manager
      .getRepository(Movie)
      .findBy({ id: In(movieIds) });
    return new Map(
      movies.map((movie) => [movie.id, MovieCatalogService.toDetails(movie)]),
    );
  }

  static toDetails(movie: Movie): MovieDetails {
    return {
      id: movie.id,
      title: movie.title,
      year: movie.year,
      price: movie.price,
    };
  }
}
