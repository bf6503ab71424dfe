// Pruebas del endpoint de salud.
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { crearApp } from '../src/app';
import { describirConexion } from '../src/compartido/salud/rutasSalud';
import { crearRepositorioTareasMemoria } from '../src/modulos/modulo_tareas/repositorioTareasMemoria';
import { crearRelojPrueba } from './utils/reloj';

describe('salud', () => {
  it('responde ok y reporta la base de datos desconectada', async () => {
    const { reloj } = crearRelojPrueba('2025-06-01T10:00:00.750Z');
    const app = crearApp({ repositorio: crearRepositorioTareasMemoria(), reloj });

    const respuesta = await request(app).get('/api/salud').expect(200);

    expect(respuesta.body).toMatchObject({
      estado: 'ok',
      servicio: 'api-tareas',
      timestamp: '2025-06-01T10:00:00Z',
      db: { estado: 0, descripcion: 'desconectado' }
    });
    expect(typeof respuesta.body.tiempoActivo).toBe('number');
  });

  it('describe los estados de conexion conocidos', () => {
    expect(describirConexion(1)).toBe('conectado');
    expect(describirConexion(3)).toBe('desconectando');
    expect(describirConexion(99)).toBe('desconocido');
  });
});
