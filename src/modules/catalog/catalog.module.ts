import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Movie } from './entities/movie.entity';
import { MovieCatalogService } from './services/movie-catalog.service';

@Module({
  imports: [TypeOrmModule.forFeature([Movie])],
  providers: [MovieCatalogService],
  exports: [MovieCatalogService],
})
export class CatalogModule {}
