import { Controller, Get, Post } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { Test } from '@nestjs/testing';
import { RouteAuth } from './route-auth.decorator';
import { RouteTableExplorer } from './route-table.explorer';

@Controller('admin/widgets')
@RouteAuth({ audience: 'admin', permissions: ['content:widget:read'] })
class WidgetController {
  @Get(':widgetId')
  find() {
    return null;
  }

  @Post()
  @RouteAuth({ audience: 'admin', permissions: ['content:widget:create'], mode: 'any' })
  create() {
    return null;
  }
}

@Controller('status')
class StatusController {
  @Get()
  status() {
    return null;
  }
}

describe('RouteTableExplorer', () => {
  it('should collect decorated routes and let handler options win', async () => {
    const module = await Test.createTestingModule({
      imports: [DiscoveryModule],
      controllers: [WidgetController, StatusController],
      providers: [RouteTableExplorer],
    }).compile();
    await module.init();

    const table = module.get(RouteTableExplorer).getTable();

    expect(table.patterns().sort()).toEqual([
      'GET /admin/widgets/:widgetId',
      'POST /admin/widgets',
    ]);
    expect(table.lookup('GET', '/admin/widgets/7')?.permissions).toEqual([
      'content:widget:read',
    ]);
    expect(table.lookup('POST', '/admin/widgets')).toMatchObject({
      permissions: ['content:widget:create'],
      mode: 'any',
    });
    expect(table.lookup('GET', '/status')).toBeNull();

    await module.close();
  });
});
